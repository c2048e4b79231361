import { Module } from '@nestjs/common';
import { FfprobeClient } from './ffprobe.client';
import { MEDIA_PROBER } from './interfaces/media-prober.interface';
import { MetadataExtractorService } from './metadata-extractor.service';

@Module({
  providers: [
    FfprobeClient,
    { provide: MEDIA_PROBER, useExisting: FfprobeClient },
    MetadataExtractorService,
  ],
  exports: [MetadataExtractorService],
})
export class MetadataModule {}
