import { ChildProcess, spawn } from 'node:child_process';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioSource, AudioSourceInfo } from './AudioSource';

const START_STABILITY_DELAY_MS = 300;
const STOP_GRACE_MS = 1500;
const BYTES_PER_SAMPLE = 2; // s16le mono

export interface FfmpegAudioSourceOptions {
  ffmpegBin: string;
  inputFormat: string;
  inputDevice: string;
  sampleRate: number;
  chunkMs: number;
  logger?: StructuredLogger;
}

interface PendingRead {
  resolve: (chunk: Buffer) => void;
  reject: (error: Error) => void;
}

const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access and retry.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return 'Microphone input device is unavailable. Check SPEECH_SEARCH_FFMPEG_FORMAT and SPEECH_SEARCH_FFMPEG_INPUT.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export const chunkByteSizeFor = (sampleRate: number, chunkMs: number): number =>
  Math.max(BYTES_PER_SAMPLE, Math.floor((sampleRate * chunkMs) / 1000) * BYTES_PER_SAMPLE);

/** Microphone capture through an ffmpeg child process writing raw PCM to stdout. */
export class FfmpegAudioSource implements AudioSource {
  private process: ChildProcess | undefined;
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private readonly chunkByteSize: number;
  private pendingRead: PendingRead | undefined;
  private failure: Error | undefined;
  private closePromise: Promise<void> | undefined;

  public constructor(private readonly options: FfmpegAudioSourceOptions) {
    this.chunkByteSize = chunkByteSizeFor(options.sampleRate, options.chunkMs);
  }

  public async open(): Promise<AudioSourceInfo> {
    if (this.process) {
      throw new Error('Audio source is already open');
    }

    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.failure = undefined;
    this.closePromise = undefined;

    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.inputDevice,
      '-ac',
      '1',
      '-ar',
      String(this.options.sampleRate),
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ];

    const ffmpeg = spawn(this.options.ffmpegBin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stderrLog = '';
    let settled = false;

    ffmpeg.stderr.on('data', (chunk) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk) => {
      this.handleAudioData(Buffer.from(chunk));
    });

    ffmpeg.on('close', (code) => {
      if (this.process === ffmpeg) {
        this.process = undefined;
      }

      this.fail(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        this.fail(error);
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.options.logger?.info('Audio source opened', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: this.options.sampleRate,
      chunkByteSize: this.chunkByteSize
    });

    return { sampleRate: this.options.sampleRate, chunkByteSize: this.chunkByteSize };
  }

  public read(): Promise<Buffer> {
    if (this.pendingRead) {
      return Promise.reject(new Error('Audio source already has a read in progress'));
    }

    const ready = this.readPendingBytes(this.chunkByteSize);
    if (ready) {
      return Promise.resolve(ready);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  public close(): Promise<void> {
    this.closePromise ??= this.stopProcess();
    return this.closePromise;
  }

  private async stopProcess(): Promise<void> {
    const current = this.process;
    this.fail(new Error('Audio source closed'));

    if (current && current.exitCode === null && current.signalCode === null) {
      await new Promise<void>((resolve) => {
        const killTimer = setTimeout(() => {
          current.kill('SIGKILL');
        }, STOP_GRACE_MS);

        current.once('close', () => {
          clearTimeout(killTimer);
          resolve();
        });

        current.kill('SIGINT');
      });
    }

    this.process = undefined;
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;

    this.options.logger?.info('Audio source closed');
  }

  private fail(error: Error): void {
    this.failure ??= error;

    const waiter = this.pendingRead;
    this.pendingRead = undefined;
    waiter?.reject(this.failure);
  }

  private handleAudioData(chunk: Buffer): void {
    if (chunk.length === 0 || this.failure) {
      return;
    }

    this.pendingChunks.push(chunk);
    this.pendingBytes += chunk.length;

    const waiter = this.pendingRead;
    if (!waiter) {
      return;
    }

    const next = this.readPendingBytes(this.chunkByteSize);
    if (next) {
      this.pendingRead = undefined;
      waiter.resolve(next);
    }
  }

  private readPendingBytes(byteCount: number): Buffer | undefined {
    if (byteCount <= 0 || byteCount > this.pendingBytes) {
      return undefined;
    }

    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
