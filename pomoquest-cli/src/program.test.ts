import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { buildProgram } from './program';

function sub(name: string): Command {
  const cmd = buildProgram().commands.find(c => c.name() === name);
  if (!cmd) throw new Error(`no ${name} command`);
  return cmd;
}

describe('buildProgram', () => {
  it('registers every command', () => {
    const names = buildProgram().commands.map(c => c.name()).filter(n => n !== 'help');
    expect(names).toEqual(['start', 'add', 'list', 'done']);
  });

  it('accepts finish as an alias for done', () => {
    expect(sub('done').aliases()).toEqual(['finish']);
  });

  it('offers task, label and force on start', () => {
    expect(sub('start').options.map(o => o.long)).toEqual(['--task', '--label', '--force']);
  });
});
