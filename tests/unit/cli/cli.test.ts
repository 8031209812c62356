/**
 * CLI - Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createCLI } from '../../../src/cli/index.js';

describe('CLI', () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('should register every command', () => {
    expect(createCLI().commands.map((c) => c.name())).toEqual(['start', 'extract', 'classify', 'exit-check']);
  });

  it('should print extracted indicators as JSON', async () => {
    await createCLI().parseAsync(['extract', 'pay rahul123@paytm or call 9876543210', '--json'], { from: 'user' });

    expect(log).toHaveBeenCalledWith(
      JSON.stringify(
        { bankAccounts: [], upiIds: ['rahul123@paytm'], phoneNumbers: ['+919876543210'], urls: [] },
        null,
        2
      )
    );
  });

  it('should report whether a message ends the conversation', async () => {
    await createCLI().parseAsync(['exit-check', 'ok bye'], { from: 'user' });
    await createCLI().parseAsync(['exit-check', 'what is my balance'], { from: 'user' });

    expect(String(log.mock.calls[0]?.[0])).toContain('exit');
    expect(String(log.mock.calls[1]?.[0])).toContain('continue');
  });
});
