import { describe, it, expect, vi, beforeAll } from 'vitest';

// Records the program definition instead of parsing argv
const registered: string[] = [];

class FakeCommand {
  name(): this {
    return this;
  }
  description(): this {
    return this;
  }
  version(): this {
    return this;
  }
  command(name: string): this {
    registered.push(`command ${name}`);
    return this;
  }
  option(): this {
    return this;
  }
  requiredOption(flags: string): this {
    registered.push(`required ${flags}`);
    return this;
  }
  action(): this {
    return this;
  }
  parseAsync(): Promise<void> {
    return Promise.resolve();
  }
}

vi.mock('commander', () => ({ Command: FakeCommand }));

beforeAll(() => {
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code ?? 0)}) intercepted in tests`);
  });
});

describe('metacodec CLI definition', () => {
  it('registers generate and check with their required options', async () => {
    const mod = await import('../index.js');
    expect(typeof mod.main).toBe('function');
    expect(registered.filter((entry) => entry.startsWith('command '))).toEqual([
      'command generate',
      'command check',
    ]);
    expect(registered.filter((entry) => entry.startsWith('required '))).toEqual([
      'required -m, --model <file>',
      'required -o, --output <dir>',
      'required -m, --model <file>',
    ]);
  });
});
