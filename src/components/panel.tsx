import React from "react";
import { Box, Text } from "ink";
import { C, I, theme } from "../theme.js";
import { fitToWidth, truncateToWidth } from "../utils.js";
import type { FilterState } from "../types.js";
import type { PanelRevision } from "../view-store.js";

const EMPTY_PLACEHOLDER = "No resources matched criteria.";

// border(2) + paddingX(2)
const CHROME_COLUMNS = 4;

interface RowsProps {
  rows: string[];
  selectedOffset: number;
  focused: boolean;
  width: number;
  height: number;
  revision: number;
}

// Re-renders only when the engine bumped this panel's rows revision
const PanelRows = React.memo(
  function PanelRows({ rows, selectedOffset, focused, width, height }: RowsProps) {
    return (
      <Box flexDirection="column" height={height} overflow="hidden">
        {rows.length === 0 && <Text color={C.dim}>{truncateToWidth(EMPTY_PLACEHOLDER, width)}</Text>}
        {rows.map((row, i) => {
          const isCursor = i === selectedOffset;
          return (
            <Text key={`${i}:${row}`} wrap="truncate">
              <Text color={isCursor ? C.primary : C.dim}>{isCursor ? I.cursor : " "} </Text>
              <Text
                color={isCursor ? C.selected : C.text}
                bold={isCursor}
                inverse={isCursor && focused}
              >
                {fitToWidth(row, Math.max(0, width - 2))}
              </Text>
            </Text>
          );
        })}
      </Box>
    );
  },
  (a, b) =>
    a.revision === b.revision && a.focused === b.focused && a.width === b.width && a.height === b.height,
);

function FilterLine({ state, filter, width }: { state: FilterState; filter: string; width: number }) {
  if (state === "normal") {
    return <Text color={C.dim}>{truncateToWidth("Press / to filter", width)}</Text>;
  }
  return (
    <Text color={C.accent} bold>
      {truncateToWidth(`${I.filter}${filter}`, width)}
    </Text>
  );
}

export function Panel({
  title,
  focused,
  width,
  listHeight,
  rows,
  total,
  selectedOffset,
  filterState,
  filter,
  revision,
}: {
  title: string;
  focused: boolean;
  width: number;
  listHeight: number;
  rows: string[];
  total: number;
  selectedOffset: number;
  filterState: FilterState;
  filter: string;
  revision: PanelRevision;
}) {
  const inner = Math.max(0, width - CHROME_COLUMNS);
  return (
    <Box
      flexDirection="column"
      borderStyle={theme.border}
      borderColor={focused ? C.primary : C.dim}
      width={width}
      flexShrink={0}
      paddingX={1}
      overflowX="hidden"
    >
      <Text color={focused ? C.primary : C.subtext} bold={focused} wrap="truncate">
        {truncateToWidth(`${title} (${total})`, inner)}
      </Text>
      <PanelRows
        rows={rows}
        selectedOffset={selectedOffset}
        focused={focused}
        width={inner}
        height={listHeight}
        revision={revision.rows}
      />
      <FilterLine state={filterState} filter={filter} width={inner} />
    </Box>
  );
}
