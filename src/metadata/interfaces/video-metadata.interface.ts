export interface VideoMetadataRecord {
  readonly id: string;
  readonly duration: number | null;
  readonly width: number | null;
  readonly height: number | null;
  readonly fps: number | null;
  readonly hasAudio: 0 | 1;
  readonly bitrate: number | null;
}

/**
 * Outcome of extracting one file. A failed extraction still carries a record:
 * whatever was read before the failure, defaults for the rest.
 */
export type ExtractionResult =
  | { ok: true; record: VideoMetadataRecord }
  | { ok: false; record: VideoMetadataRecord; error: Error };
