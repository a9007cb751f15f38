import { Module } from '@nestjs/common';
import { envs } from '../config/envs';
import { PdfModule } from '../pdf/pdf.module';
import { StorageModule } from '../storage/storage.module';
import { MergeController } from './merge.controller';
import { MergeService } from './merge.service';
import { ConversionPipeline } from './pipeline/conversion-pipeline';
import { MERGE_PIPELINE_CONFIG, MergePipelineConfig } from './pipeline/pipeline.config';

@Module({
  imports: [PdfModule, StorageModule],
  controllers: [MergeController],
  providers: [
    {
      provide: MERGE_PIPELINE_CONFIG,
      useFactory: (): MergePipelineConfig => ({
        jobTimeoutMs: envs.jobTimeoutMs,
        conversionConcurrency: envs.conversionConcurrency,
      }),
    },
    ConversionPipeline,
    MergeService,
  ],
})
export class MergeModule {}
