import React from 'react';
import { Box, Text } from 'ink';
import type { BountyLine } from '../SessionViewState';

interface BountyListProps {
  bounties: BountyLine[];
  dimColor: string;
}

export function BountyList({ bounties, dimColor }: BountyListProps): React.ReactElement {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold>Today's bounties</Text>
      {bounties.map(b => (
        <Text key={b.title}>
          {b.completed ? <Text color="green">{'✔'}</Text> : <Text color={dimColor}>{'○'}</Text>}
          {' '}
          <Text bold={!b.completed} color={b.completed ? dimColor : undefined}>{b.title}</Text>
          <Text color={dimColor}> {b.description}</Text>
          {b.target > 1 && !b.completed && <Text color={dimColor}> ({b.progress}/{b.target})</Text>}
          <Text color="yellow"> +{b.rewardXP} XP</Text>
        </Text>
      ))}
    </Box>
  );
}
