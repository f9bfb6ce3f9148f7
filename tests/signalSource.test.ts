import { QueuedSignalSource, parseCommand } from '../src/signals/index.js';

describe('signal source', () => {
  it('parses chat commands', () => {
    expect(parseCommand('b')).toBe('BUY');
    expect(parseCommand(' S ')).toBe('SELL');
    expect(parseCommand('/c')).toBe('CLOSE');
    expect(parseCommand('hold')).toBe('HOLD');
    expect(parseCommand('x')).toBeNull();
  });

  it('drains queued signals in order', async () => {
    const source = new QueuedSignalSource();
    source.push('SELL');
    source.pushCommand('c');

    await expect(source.poll()).resolves.toEqual(['SELL', 'CLOSE']);
    await expect(source.poll()).resolves.toEqual([]);
  });

  it('ignores unknown commands', () => {
    const source = new QueuedSignalSource();

    expect(source.pushCommand('moon')).toBeNull();
    expect(source.size).toBe(0);
  });

  it('does not resolve object prototype names as commands', () => {
    const source = new QueuedSignalSource();

    for (const word of ['constructor', 'toString', 'valueOf', '__proto__', 'hasOwnProperty']) {
      expect(parseCommand(word)).toBeNull();
      expect(source.pushCommand(`/${word}`)).toBeNull();
    }
    expect(source.size).toBe(0);
  });
});
