/**
 * kcascade: four cascading panels over kubectl
 *
 * The engine (Navigator + Panels) owns all state and survives remounts;
 * this tree only renders it. An external command unmounts the tree and a
 * fresh one is mounted afterwards from the same engine.
 */
import React from "react";
import { Box } from "ink";
import { Panel } from "./components/panel.js";
import { ConfirmBar, StatusBar } from "./components/status-bar.js";
import { useViewStore } from "./hooks/use-view-store.js";
import { useTerminalInput } from "./hooks/use-terminal-input.js";
import { useBackgroundRefresh } from "./hooks/use-background-refresh.js";
import { ROWS_ABOVE_LIST, ROWS_BELOW_LIST } from "./layout.js";
import type { Navigator } from "./engine/navigator.js";
import type { ViewStore } from "./view-store.js";
import type { KeyBinding } from "./types.js";
import type { TerminalStreams } from "./terminal/screen.js";

export interface AppProps {
  navigator: Navigator;
  store: ViewStore;
  bindings: readonly KeyBinding[];
  refreshIntervalMs: number;
  streams: TerminalStreams;
}

export function App({ navigator, store, bindings, refreshIntervalMs, streams }: AppProps) {
  useViewStore(store);
  useTerminalInput(navigator, streams);
  useBackgroundRefresh(navigator.scheduler, refreshIntervalMs);

  const panels = navigator.panels;
  const listHeight = panels[0]?.geometry.height ?? 1;
  const width = panels.reduce((s, p) => s + p.geometry.width, 0);
  const pending = navigator.confirmation;

  return (
    <Box flexDirection="column">
      <Box height={listHeight + ROWS_ABOVE_LIST + ROWS_BELOW_LIST}>
        {panels.map((p, i) => (
          <Panel
            key={p.title}
            title={p.title}
            focused={i === navigator.active}
            width={p.geometry.width}
            listHeight={p.geometry.height}
            rows={p.visibleRows()}
            total={p.filteredRows.size}
            selectedOffset={p.selectedOffset}
            filterState={p.state}
            filter={p.filter}
            revision={store.revision(i)}
          />
        ))}
      </Box>
      {pending ? <ConfirmBar pending={pending} width={width} /> : <StatusBar bindings={bindings} width={width} />}
    </Box>
  );
}
