/**
 * Stack of the most recent toasts. Expiry is handled by SessionViewState.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ToastEntry, ToastSeverity } from '../SessionViewState';
import { truncate } from '../formatters';

const SEVERITY_COLOR: Record<ToastSeverity, string> = {
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
  success: 'green',
};

const SEVERITY_ICON: Record<ToastSeverity, string> = {
  error: '\u2718',   // ✘
  warning: '\u26A0', // ⚠
  info: '\u25CF',    // ●
  success: '\u2605', // ★
};

const MAX_VISIBLE = 4;

interface ToastStackProps {
  toasts: ToastEntry[];
}

export function ToastStack({ toasts }: ToastStackProps): React.ReactElement | null {
  if (toasts.length === 0) return null;
  const visible = toasts.slice(-MAX_VISIBLE);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={SEVERITY_COLOR[visible[visible.length - 1].severity]} paddingX={1}>
      {visible.map(toast => (
        <Text key={toast.id} color={SEVERITY_COLOR[toast.severity]}>
          {SEVERITY_ICON[toast.severity]} {truncate(toast.message, 64)}
        </Text>
      ))}
    </Box>
  );
}
