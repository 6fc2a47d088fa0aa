import { beforeEach, describe, it, expect, vi } from 'vitest';
import { runCommand } from '../process/runCommand';
import { CommandSpeechOutput } from './CommandSpeechOutput';

vi.mock('../process/runCommand', () => ({
  runCommand: vi.fn(async () => ({ stdout: '', stderr: '' }))
}));

describe('CommandSpeechOutput', () => {
  beforeEach(() => {
    vi.mocked(runCommand).mockClear();
  });

  it('passes the collapsed text as the last argument', async () => {
    const speech = new CommandSpeechOutput({ command: 'say', args: ['-r', '180'], timeoutMs: 5000 });

    await speech.speak('  Sunny\n and   mild. ');

    expect(runCommand).toHaveBeenCalledWith('say', ['-r', '180', 'Sunny and mild.'], { timeoutMs: 5000 });
  });

  it('stays silent for blank text', async () => {
    const speech = new CommandSpeechOutput({ command: 'espeak', timeoutMs: 5000 });

    await speech.speak(' \n ');

    expect(runCommand).not.toHaveBeenCalled();
  });

  it('propagates command failures', async () => {
    vi.mocked(runCommand).mockRejectedValueOnce(new Error('Command failed (1): espeak'));
    const speech = new CommandSpeechOutput({ command: 'espeak', timeoutMs: 5000 });

    await expect(speech.speak('hello')).rejects.toThrow('Command failed (1): espeak');
  });
});
