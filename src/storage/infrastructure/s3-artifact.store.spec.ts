import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { Logger } from '@nestjs/common';
import { ArtifactIOError, ArtifactNotFoundError } from '../../shared/errors/merge-job.errors';
import { S3ArtifactStore } from './s3-artifact.store';

const createStore = () => {
  const send = jest.fn();
  const s3Client = { send } as unknown as S3Client;
  const store = new S3ArtifactStore(s3Client, { bucket: 'merge-bucket', keyPrefix: 'pdfs/output' });
  return { store, send };
};

describe('S3ArtifactStore', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uploads under the configured prefix', async () => {
    const { store, send } = createStore();
    send.mockResolvedValue({});

    const saved = await store.save('merged_x.pdf', Buffer.from('%PDF'));

    expect(saved).toEqual({ key: 'merged_x.pdf', size: 4 });
    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command.input).toEqual({
      Bucket: 'merge-bucket',
      Key: 'pdfs/output/merged_x.pdf',
      Body: Buffer.from('%PDF'),
      ContentType: 'application/pdf',
    });
  });

  it('wraps upload failures', async () => {
    const { store, send } = createStore();
    send.mockRejectedValue(new Error('AccessDenied'));

    await expect(store.save('a.png', Buffer.from('x'))).rejects.toMatchObject({
      code: 'IO_ERROR',
      key: 'a.png',
    });
  });

  it('reads the object body as a buffer', async () => {
    const { store, send } = createStore();
    send.mockResolvedValue({
      Body: { transformToByteArray: async () => new Uint8Array([37, 80, 68, 70]) },
    });

    const content = await store.load('merged_x.pdf');

    expect(content.toString()).toBe('%PDF');
    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(GetObjectCommand);
    expect(command.input).toEqual({ Bucket: 'merge-bucket', Key: 'pdfs/output/merged_x.pdf' });
  });

  it('maps a missing object to ArtifactNotFoundError', async () => {
    const { store, send } = createStore();
    send.mockRejectedValue(new NoSuchKey({ message: 'missing', $metadata: {} }));

    await expect(store.load('merged_x.pdf')).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it('reports other read failures as IO errors', async () => {
    const { store, send } = createStore();
    send.mockRejectedValue(new Error('socket hang up'));

    const result = store.load('merged_x.pdf');

    await expect(result).rejects.toBeInstanceOf(ArtifactIOError);
    await expect(result).rejects.not.toBeInstanceOf(ArtifactNotFoundError);
  });

  it('checks existence with HeadObject', async () => {
    const { store, send } = createStore();
    send.mockResolvedValueOnce({}).mockRejectedValueOnce(new NotFound({ message: 'nf', $metadata: {} }));

    expect(await store.exists('a.pdf')).toBe(true);
    expect(await store.exists('b.pdf')).toBe(false);
    expect(send.mock.calls[0][0]).toBeInstanceOf(HeadObjectCommand);
  });

  it('deletes idempotently', async () => {
    const { store, send } = createStore();
    send.mockResolvedValue({});

    await store.delete('a.pdf');

    const [command] = send.mock.calls[0];
    expect(command).toBeInstanceOf(DeleteObjectCommand);
    expect(command.input).toEqual({ Bucket: 'merge-bucket', Key: 'pdfs/output/a.pdf' });
  });
});
