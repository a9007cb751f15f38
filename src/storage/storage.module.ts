import { Module } from '@nestjs/common';
import { envs } from '../config/envs';
import { OUTPUT_STORE, UPLOAD_STORE } from './domain/artifact-store';
import { createArtifactStore } from './storage.factory';

@Module({
  providers: [
    {
      provide: UPLOAD_STORE,
      useFactory: () => createArtifactStore('uploads', envs),
    },
    {
      provide: OUTPUT_STORE,
      useFactory: () => createArtifactStore('output', envs),
    },
  ],
  exports: [UPLOAD_STORE, OUTPUT_STORE],
})
export class StorageModule {}
