/**
 * Root ink component for a running session: level header, phase clock with
 * progress bar, session label and prompt, run totals, today's bounties,
 * toasts and key hints. All state lives in SessionViewState; this only draws the model.
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import { PHASE_TAGS } from 'pomoquest-core';
import type { ColorsConfig, SessionSnapshot } from 'pomoquest-core';
import type { SessionViewModel } from '../SessionViewState';
import { makeBar, phaseClock, phasePercent, truncate, formatRunTotals } from '../formatters';
import { useTerminalWidth } from './useTerminalWidth';
import { StatusBar } from './StatusBar';
import { BountyList } from './BountyList';
import { ToastStack } from './ToastNotification';

const MIN_BAR_WIDTH = 10;
const MAX_BAR_WIDTH = 50;
const XP_BAR_WIDTH = 20;

export interface SessionViewProps {
  model: SessionViewModel;
  colors: ColorsConfig;
  onInput: (input: string, ctrl: boolean) => void;
}

function phaseColor(snapshot: SessionSnapshot, colors: ColorsConfig): string {
  if (snapshot.paused) return colors.pause;
  switch (snapshot.phase) {
    case 'work':
    case 'flow':
      return colors.work;
    case 'break':
    case 'long_break':
      return colors.break;
    case 'terminated':
      return colors.dim;
  }
}

export function SessionView({ model, colors, onInput }: SessionViewProps): React.ReactElement {
  const columns = useTerminalWidth();
  const { snapshot, level } = model;

  useInput((input, key) => {
    onInput(input, key.ctrl);
  });

  const color = phaseColor(snapshot, colors);
  const barWidth = Math.max(MIN_BAR_WIDTH, Math.min(MAX_BAR_WIDTH, columns - 12));
  const running = snapshot.phase !== 'terminated';
  const title = running ? PHASE_TAGS[snapshot.phase] : 'BREAK OVER';
  const totals = formatRunTotals(snapshot.totals);
  const working = snapshot.phase === 'work' || snapshot.phase === 'flow';

  return (
    <Box flexDirection="column" paddingX={1}>
      {/* Level header */}
      <Text>
        <Text bold color="yellow">Level {level.level}</Text>
        <Text> </Text>
        <Text color="yellow">{makeBar((level.xpIntoLevel / level.xpPerLevel) * 100, XP_BAR_WIDTH)}</Text>
        <Text color={colors.dim}> {level.xpIntoLevel}/{level.xpPerLevel} XP</Text>
      </Text>

      {/* Phase */}
      <Box flexDirection="column" borderStyle="round" borderColor={color} paddingX={2} marginTop={1}>
        <Text>
          <Text bold color={color}>{title}</Text>
          <Text color={colors.dim}>  session {snapshot.sessionNumber}</Text>
          {snapshot.paused && <Text bold color={colors.pause}>  PAUSED</Text>}
        </Text>
        {running ? (
          <>
            <Text bold>{phaseClock(snapshot)}</Text>
            <Text color={color}>{makeBar(phasePercent(snapshot), barWidth)}</Text>
          </>
        ) : (
          <Text color={colors.dim}>Ready when you are.</Text>
        )}
        {snapshot.phase === 'flow' && (
          <Text color={colors.dim}>In the flow: overtime earns bonus XP and extends your break</Text>
        )}
        <Text>
          <Text color={colors.dim}>Task </Text>
          {model.task && <Text bold>#{model.task.id} </Text>}
          <Text>{truncate(model.label, 48)}</Text>
        </Text>
      </Box>

      {/* Run totals */}
      <Box paddingX={1}>
        <Text>
          <Text bold={working} color={working ? colors.work : colors.dim}>Work  {totals.work}</Text>
          <Text>    </Text>
          <Text bold={!working && running} color={!working && running ? colors.break : colors.dim}>Break {totals.rest}</Text>
        </Text>
      </Box>

      {model.prompt && (
        <Box marginTop={1}>
          <Text color="yellow">Did you finish "{truncate(model.prompt.name, 48)}"? </Text>
          <Text bold>(y/n)</Text>
        </Box>
      )}

      <BountyList bounties={model.bounties} dimColor={colors.dim} />

      <ToastStack toasts={model.toasts} />

      <Box marginTop={1}>
        <StatusBar hints={model.hints} sessionsToday={model.sessionsToday} />
      </Box>
    </Box>
  );
}
