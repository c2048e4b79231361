import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { VideoMetadataRecord } from '../metadata/interfaces/video-metadata.interface';
import { MetadataExtractorService } from '../metadata/metadata-extractor.service';
import { extractionConfig } from '../settings/dotenv-options';
import { CsvCell, CsvTableWriter } from './csv-table.writer';

export const METADATA_COLUMNS = [
  'Id',
  'duration',
  'width',
  'height',
  'fps',
  'has_audio',
  'bitrate',
] as const;

export interface BatchSummary {
  outputPath: string;
  rows: number;
  failed: number;
}

export function toRow(record: VideoMetadataRecord): CsvCell[] {
  return [
    record.id,
    record.duration,
    record.width,
    record.height,
    record.fps,
    record.hasAudio,
    record.bitrate,
  ];
}

@Injectable()
export class BatchRunnerService {
  private readonly logger = new Logger(BatchRunnerService.name);
  private readonly videoExtension: string;

  constructor(
    private readonly metadataExtractor: MetadataExtractorService,
    private readonly configService: ConfigService,
  ) {
    this.videoExtension = extractionConfig
      .videoExtension(this.configService)
      .toLowerCase();
  }

  /**
   * Writes one CSV row per video file in `inputDir`. Returns null without
   * touching `outputPath` when the input directory is missing; output I/O
   * errors propagate.
   */
  async run(inputDir: string, outputPath: string): Promise<BatchSummary | null> {
    if (!(await this.isDirectory(inputDir))) {
      this.logger.error(`Video directory does not exist: ${inputDir}`);
      return null;
    }

    const files = await this.listVideoFiles(inputDir);
    this.logger.log(
      `Found ${files.length} ${this.videoExtension} files in ${inputDir}`,
    );

    let failed = 0;
    const writer = await CsvTableWriter.open(outputPath, METADATA_COLUMNS);
    try {
      for (const [index, fileName] of files.entries()) {
        // absolute, so a name like "-x.mp4" never reaches ffprobe as an option
        const result = await this.metadataExtractor.tryExtract(
          path.resolve(inputDir, fileName),
        );
        if (!result.ok) {
          failed++;
        }

        await writer.writeRow(toRow(result.record));
        this.logger.log(
          `Extracting metadata [${index + 1}/${files.length}] ${fileName}`,
        );
      }
    } finally {
      await writer.close();
    }

    this.logger.log(
      `Extraction complete: ${writer.rows} rows (${failed} failed) saved to ${outputPath}`,
    );
    return { outputPath, rows: writer.rows, failed };
  }

  /** Matching names in directory order; entries that are not files are skipped. */
  async listVideoFiles(inputDir: string): Promise<string[]> {
    const names = (await fs.readdir(inputDir)).filter((name) =>
      name.toLowerCase().endsWith(this.videoExtension),
    );

    const files: string[] = [];
    for (const name of names) {
      if (await this.isFile(path.join(inputDir, name))) {
        files.push(name);
      } else {
        this.logger.warn(`Skipping ${name}: not a regular file`);
      }
    }
    return files;
  }

  private async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }
}
