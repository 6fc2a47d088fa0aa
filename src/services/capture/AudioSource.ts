export interface AudioSourceInfo {
  sampleRate: number;
  chunkByteSize: number;
}

/**
 * Microphone handle producing fixed-size 16-bit mono PCM chunks on demand.
 * `read` rejects once the device has failed or been closed.
 */
export interface AudioSource {
  open(): Promise<AudioSourceInfo>;
  read(): Promise<Buffer>;
  close(): Promise<void>;
}
