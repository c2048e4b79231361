import { Module } from '@nestjs/common';
import { MetadataModule } from '../metadata/metadata.module';
import { BatchRunnerService } from './batch-runner.service';

@Module({
  imports: [MetadataModule],
  providers: [BatchRunnerService],
  exports: [BatchRunnerService],
})
export class BatchModule {}
