import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as ffmpeg from 'fluent-ffmpeg';
import { MediaProber, ProbeTree } from './interfaces/media-prober.interface';

/** Extra ffprobe arguments; fluent-ffmpeg adds -show_streams and -show_format. */
export const FFPROBE_OPTIONS = ['-v', 'quiet'];

@Injectable()
export class FfprobeClient implements MediaProber {
  private readonly logger = new Logger(FfprobeClient.name);

  constructor(private readonly configService: ConfigService) {
    const ffprobePath = this.configService.get<string>('FFPROBE_PATH');
    if (ffprobePath) {
      ffmpeg.setFfprobePath(ffprobePath);
      this.logger.log(`Using ffprobe at ${ffprobePath}`);
    }
  }

  probe(filePath: string): Promise<ProbeTree> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, FFPROBE_OPTIONS, (err, metadata) => {
        if (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        if (!metadata) {
          reject(new Error('ffprobe returned no output'));
          return;
        }

        resolve({ format: metadata.format, streams: metadata.streams });
      });
    });
  }
}
