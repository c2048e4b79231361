import { ConfigService } from '@nestjs/config';

export const extractionDefaults = {
  videoExtension: '.mp4',
  inputDir: './videos',
  outputPath: './video_metadata.csv',
};

export const extractionConfig = {
  videoExtension: (config: ConfigService) =>
    config.get<string>('VIDEO_EXTENSION') || extractionDefaults.videoExtension,
  inputDir: (config: ConfigService) =>
    config.get<string>('METADATA_INPUT_DIR') || extractionDefaults.inputDir,
  outputPath: (config: ConfigService) =>
    config.get<string>('METADATA_OUTPUT_PATH') || extractionDefaults.outputPath,
};
