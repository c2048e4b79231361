import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import {
  MEDIA_PROBER,
  MediaProber,
} from './interfaces/media-prober.interface';
import {
  ExtractionResult,
  VideoMetadataRecord,
} from './interfaces/video-metadata.interface';
import {
  findStream,
  isSection,
  parseFrameRate,
  readFloat,
  readInteger,
  sectionListOf,
  sectionOf,
} from './probe-fields';

type MutableRecord = {
  -readonly [K in keyof VideoMetadataRecord]: VideoMetadataRecord[K];
};

/** "clip.final.mp4" -> "clip.final" */
export function videoIdFromFileName(fileName: string): string {
  return path.parse(fileName).name;
}

export function emptyRecord(id: string): VideoMetadataRecord {
  return {
    id,
    duration: null,
    width: null,
    height: null,
    fps: null,
    hasAudio: 0,
    bitrate: null,
  };
}

@Injectable()
export class MetadataExtractorService {
  private readonly logger = new Logger(MetadataExtractorService.name);

  constructor(@Inject(MEDIA_PROBER) private readonly prober: MediaProber) {}

  async extract(filePath: string): Promise<VideoMetadataRecord> {
    const result = await this.tryExtract(filePath);
    return result.record;
  }

  /** Never rejects: failures come back as `{ ok: false }` with a partial record. */
  async tryExtract(filePath: string): Promise<ExtractionResult> {
    const record: MutableRecord = {
      ...emptyRecord(videoIdFromFileName(path.basename(filePath))),
    };

    try {
      const tree = await this.prober.probe(filePath);
      if (!isSection(tree)) {
        throw new Error('prober output is not an object');
      }

      const format = sectionOf(tree, 'format');
      record.duration = readFloat(format, 'duration');
      record.bitrate = readInteger(format, 'bit_rate');

      const streams = sectionListOf(tree, 'streams');
      const videoStream = findStream(streams, 'video');
      const audioStream = findStream(streams, 'audio');

      if (videoStream) {
        record.width = readInteger(videoStream, 'width');
        record.height = readInteger(videoStream, 'height');
        record.fps = parseFrameRate(videoStream.r_frame_rate);
      }

      record.hasAudio = audioStream ? 1 : 0;

      return { ok: true, record: Object.freeze(record) };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Failed to process ${filePath}: ${error.message}`);
      return { ok: false, record: Object.freeze(record), error };
    }
  }
}
