/**
 * Pure helpers behind the task picker shown by a bare `pomoquest start`.
 * Split from the ink component so the selection logic is testable.
 */

import type { Task } from 'pomoquest-core';
import { DEFAULT_SESSION_LABEL } from 'pomoquest-core';

export interface PickerItem {
  /** Null for the general-focus entry. */
  task: Task | null;
  label: string;
}

export type PickerResult =
  | { type: 'task'; task: Task }
  | { type: 'general' }
  | { type: 'quit' };

export interface PickerConditions {
  durations: readonly string[];
  taskOption?: string;
  labelOption?: string;
  pending: number;
  interactive: boolean;
}

/** Only a bare `start` on a terminal, with something to pick, asks. */
export function shouldOfferPicker(c: PickerConditions): boolean {
  return (
    c.interactive &&
    c.pending > 0 &&
    c.durations.length === 0 &&
    c.taskOption === undefined &&
    c.labelOption === undefined
  );
}

/** General focus first, so Enter on the default row starts without a task. */
export function pickerItems(tasks: readonly Task[]): PickerItem[] {
  return [
    { task: null, label: DEFAULT_SESSION_LABEL },
    ...tasks.map(task => ({ task, label: `#${task.id} ${task.name}` })),
  ];
}

export function moveSelection(index: number, delta: number, count: number): number {
  return Math.max(0, Math.min(count - 1, index + delta));
}

export function resultFor(item: PickerItem): PickerResult {
  return item.task ? { type: 'task', task: item.task } : { type: 'general' };
}
