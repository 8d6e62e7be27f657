/**
 * Status bar (bottom row): brand + version on the left, key hints on the right.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { KeyHint } from '../SessionViewState';
import { BRAND_INLINE, CLI_VERSION } from '../branding';

interface StatusBarProps {
  hints: KeyHint[];
  sessionsToday: number;
}

export function StatusBar({ hints, sessionsToday }: StatusBarProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Box>
        <Text bold color="red">{BRAND_INLINE}</Text>
        <Text dimColor> v{CLI_VERSION}</Text>
      </Box>

      <Box flexGrow={1} justifyContent="center">
        <Text dimColor> {'│'} </Text>
        <Text>{sessionsToday} today</Text>
      </Box>

      <Box>
        <Text dimColor>{'│'} </Text>
        <Text>
          {hints.map(h => (
            <Text key={h.key}>
              <Text bold>{h.key}</Text><Text dimColor> {h.label} </Text>
            </Text>
          ))}
        </Text>
      </Box>
    </Box>
  );
}
