/**
 * Ink-based task picker shown before a bare `pomoquest start`.
 * Lists pending tasks under a general-focus entry and lets the user pick one.
 */

import React, { useState } from 'react';
import { Box, Text, useInput, useApp } from 'ink';
import type { Task } from 'pomoquest-core';
import { pickerItems, moveSelection, resultFor } from '../taskPicker';
import type { PickerItem, PickerResult } from '../taskPicker';
import { BRAND_INLINE } from '../branding';
import { truncate } from '../formatters';

interface TaskPickerProps {
  items: PickerItem[];
  onSelect: (item: PickerItem) => void;
}

export function TaskPicker({ items, onSelect }: TaskPickerProps): React.ReactElement {
  const [selectedIndex, setSelectedIndex] = useState(0);
  const { exit } = useApp();

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit();
      return;
    }

    if (input === 'j' || key.downArrow) {
      setSelectedIndex(prev => moveSelection(prev, 1, items.length));
      return;
    }

    if (input === 'k' || key.upArrow) {
      setSelectedIndex(prev => moveSelection(prev, -1, items.length));
      return;
    }

    if (key.return) {
      onSelect(items[selectedIndex]);
      exit();
    }
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold color="red">{BRAND_INLINE}</Text>
      <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} marginTop={1}>
        <Text color="cyan">What are you working on?</Text>
        {items.map((item, i) => (
          <Text key={item.task?.id ?? 0} inverse={i === selectedIndex} dimColor={item.task === null && i !== selectedIndex}>
            {truncate(item.label, 60)}
          </Text>
        ))}
      </Box>
      <Text>
        <Text bold>{'↑'}/{'↓'}</Text><Text dimColor> navigate  </Text>
        <Text bold>Enter</Text><Text dimColor> start  </Text>
        <Text bold>q</Text><Text dimColor> quit</Text>
      </Text>
    </Box>
  );
}

/** Shows the picker and resolves with the choice; quitting resolves `{ type: 'quit' }`. */
export async function showTaskPicker(tasks: readonly Task[]): Promise<PickerResult> {
  const { render } = await import('ink');

  let result: PickerResult = { type: 'quit' };
  const instance = render(
    <TaskPicker items={pickerItems(tasks)} onSelect={(item) => { result = resultFor(item); }} />,
  );
  await instance.waitUntilExit();
  return result;
}
