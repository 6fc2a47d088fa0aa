import { describeError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { AudioSource } from '../services/capture/AudioSource';
import { CaptureBuffer } from './CaptureBuffer';
import { StopSignal } from './StopSignal';

export type CaptureExitReason = 'stopped' | 'device-failure';

export interface CaptureSummary {
  reason: CaptureExitReason;
  chunks: number;
  bytes: number;
  detail?: string;
}

export class CaptureLoop {
  private running: Promise<CaptureSummary> | undefined;

  public constructor(
    private readonly source: AudioSource,
    private readonly buffer: CaptureBuffer,
    private readonly stop: StopSignal,
    private readonly logger?: StructuredLogger
  ) {}

  /**
   * Starts reading in the background. The returned promise settles when the
   * loop has exited and the sentinel is in the buffer; it never rejects.
   */
  public start(): Promise<CaptureSummary> {
    if (this.running) {
      throw new Error('Capture loop already started');
    }

    this.running = this.run();
    return this.running;
  }

  private async run(): Promise<CaptureSummary> {
    let chunks = 0;
    let bytes = 0;

    try {
      while (!this.stop.isSet()) {
        const chunk = await this.source.read();
        this.buffer.put(chunk);
        chunks += 1;
        bytes += chunk.length;
      }

      this.logger?.debug('Capture loop stopped', { chunks, bytes });
      return { reason: 'stopped', chunks, bytes };
    } catch (error) {
      const detail = describeError(error);
      this.logger?.warn('Audio device read failed; ending capture', { detail, chunks, bytes });
      return { reason: 'device-failure', chunks, bytes, detail };
    } finally {
      this.buffer.close();
    }
  }
}
