import React from "react";
import { Box, Text } from "ink";
import { C, I } from "../theme.js";
import type { KeyBinding, PendingConfirm } from "../types.js";
import { truncateToWidth } from "../utils.js";

const KEY_LABELS: Record<string, string> = { delete: "Del", enter: "Enter" };

export function keyLabel(key: string): string {
  return KEY_LABELS[key] ?? key;
}

export function StatusBar({ bindings, width }: { bindings: readonly KeyBinding[]; width: number }) {
  return (
    <Box paddingX={1} flexShrink={0} width={width}>
      <Text wrap="truncate">
        {bindings.map((b) => (
          <Text key={b.key}>
            <Text color={b.confirm ? C.error : C.primary} bold>{keyLabel(b.key)}</Text>
            <Text color={C.subtext}> {b.description}  </Text>
          </Text>
        ))}
        <Text color={C.dim}>tab panels · / filter · ^R reload · q quit</Text>
      </Text>
    </Box>
  );
}

// One-line yes/no gate shown in place of the status bar
export function ConfirmBar({ pending, width }: { pending: PendingConfirm; width: number }) {
  const { binding, params } = pending;
  const target = `${params.kind}/${params.resource} in ${params.namespace} (${params.context})`;
  return (
    <Box paddingX={1} flexShrink={0} width={width}>
      <Text wrap="truncate">
        <Text color={C.warning} bold>{I.confirm} </Text>
        <Text color={C.warning}>{truncateToWidth(`${binding.description} ${target}?`, Math.max(0, width - 12))}</Text>
        <Text color={C.text} bold> [y/N]</Text>
      </Text>
    </Box>
  );
}
