jest.mock('../config/envs', () => ({
  envs: { apiPrefix: '/api/v1/' },
}));

import { HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { InMemoryArtifactStore } from '../../test/support/in-memory-artifact.store';
import {
  DecodeError,
  JobTimeoutError,
  UnsupportedFormatError,
} from '../shared/errors/merge-job.errors';
import { MergeService } from './merge.service';
import { ConversionPipeline } from './pipeline/conversion-pipeline';

const createService = () => {
  const pipeline = { run: jest.fn() };
  const outputStore = new InMemoryArtifactStore('output');

  return {
    service: new MergeService(pipeline as unknown as ConversionPipeline, outputStore),
    pipeline,
    outputStore,
  };
};

const responseOf = (error: unknown) => {
  expect(error).toBeInstanceOf(HttpException);
  return error instanceof HttpException
    ? { status: error.getStatus(), body: error.getResponse() }
    : undefined;
};

describe('MergeService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps uploads in order and builds the download url', async () => {
    const { service, pipeline } = createService();
    const signal = new AbortController().signal;
    pipeline.run.mockResolvedValue({
      jobId: '20260105_090703_1a2b3c4d',
      name: 'merged_20260105_090703_1a2b3c4d.pdf',
      key: 'merged_20260105_090703_1a2b3c4d.pdf',
      size: 1234,
    });

    const result = await service.mergeUploads(
      [
        { originalname: 'a.png', buffer: Buffer.from('a') },
        { originalname: 'b.pdf', buffer: Buffer.from('b') },
      ],
      signal,
    );

    expect(pipeline.run).toHaveBeenCalledWith(
      [
        { name: 'a.png', content: Buffer.from('a') },
        { name: 'b.pdf', content: Buffer.from('b') },
      ],
      { signal },
    );
    expect(result).toEqual({
      status: 'success',
      jobId: '20260105_090703_1a2b3c4d',
      filename: 'merged_20260105_090703_1a2b3c4d.pdf',
      downloadUrl: '/api/v1/merge/download/merged_20260105_090703_1a2b3c4d.pdf',
      size: 1234,
    });
  });

  it('passes an empty list when no files arrive', async () => {
    const { service, pipeline } = createService();
    pipeline.run.mockResolvedValue({ jobId: 'x', name: 'y', key: 'y', size: 0 });

    await service.mergeUploads(undefined);

    expect(pipeline.run).toHaveBeenCalledWith([], { signal: undefined });
  });

  it.each([
    [new UnsupportedFormatError('notas.txt', '.txt'), HttpStatus.UNSUPPORTED_MEDIA_TYPE, 'UNSUPPORTED_FORMAT'],
    [new DecodeError('rota.png', 'corrupta'), HttpStatus.UNPROCESSABLE_ENTITY, 'DECODE_ERROR'],
    [new JobTimeoutError('job', 10), HttpStatus.REQUEST_TIMEOUT, 'TIMEOUT'],
  ])('translates %p into an HTTP error', async (jobError, status, code) => {
    const { service, pipeline } = createService();
    pipeline.run.mockRejectedValue(jobError);

    const error = await service.mergeUploads([]).catch((caught: unknown) => caught);

    expect(responseOf(error)).toEqual({
      status,
      body: { statusCode: status, error: code, message: jobError.message },
    });
  });

  it('answers 500 for unexpected failures', async () => {
    const { service, pipeline } = createService();
    pipeline.run.mockRejectedValue(new Error('boom'));

    const error = await service.mergeUploads([]).catch((caught: unknown) => caught);

    expect(responseOf(error)).toEqual({
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { statusCode: 500, error: 'INTERNAL', message: 'Error inesperado: boom' },
    });
  });

  it('returns stored outputs', async () => {
    const { service, outputStore } = createService();
    await outputStore.save('merged_20260105_090703_1a2b3c4d.pdf', Buffer.from('%PDF-1.7'));

    const pdf = await service.getOutput('merged_20260105_090703_1a2b3c4d.pdf');

    expect(pdf.toString()).toBe('%PDF-1.7');
  });

  it('answers 404 for missing outputs', async () => {
    const { service } = createService();

    await expect(service.getOutput('merged_20260105_090703_1a2b3c4d.pdf')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('answers 500 when the output store fails', async () => {
    const { service, outputStore } = createService();
    outputStore.failWhen('load');

    const error = await service
      .getOutput('merged_20260105_090703_1a2b3c4d.pdf')
      .catch((caught: unknown) => caught);

    expect(responseOf(error)?.status).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
  });
});
