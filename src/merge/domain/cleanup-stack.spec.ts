import { Logger } from '@nestjs/common';
import { CleanupStack } from './cleanup-stack';

describe('CleanupStack', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger('CleanupStackTest');
    jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('disposes in reverse registration order', async () => {
    const stack = new CleanupStack(logger);
    const order: string[] = [];
    stack.defer('a', async () => void order.push('a'));
    stack.defer('b', async () => void order.push('b'));
    stack.defer('c', async () => void order.push('c'));

    const failures = await stack.dispose();

    expect(order).toEqual(['c', 'b', 'a']);
    expect(failures).toEqual([]);
    expect(stack.size).toBe(0);
  });

  it('keeps going after a failure and reports it', async () => {
    const stack = new CleanupStack(logger);
    const order: string[] = [];
    const boom = new Error('disco lleno');
    stack.defer('a', async () => void order.push('a'));
    stack.defer('b', async () => {
      throw boom;
    });
    stack.defer('c', async () => void order.push('c'));

    const failures = await stack.dispose();

    expect(order).toEqual(['c', 'a']);
    expect(failures).toEqual([{ label: 'b', error: boom }]);
    expect(logger.warn).toHaveBeenCalledWith('[cleanup] no se pudo liberar "b": Error: disco lleno');
  });

  it('releases a single entry early and only once', async () => {
    const stack = new CleanupStack(logger);
    const dispose = jest.fn(async () => undefined);
    const release = stack.defer('a', dispose);

    await release();
    await release();
    await stack.dispose();

    expect(dispose).toHaveBeenCalledTimes(1);
    expect(stack.size).toBe(0);
  });

  it('retries a failed early release on dispose', async () => {
    const stack = new CleanupStack(logger);
    const dispose = jest
      .fn<Promise<void>, []>()
      .mockRejectedValueOnce(new Error('ocupado'))
      .mockResolvedValueOnce(undefined);
    const release = stack.defer('a', dispose);

    await expect(release()).rejects.toThrow('ocupado');
    expect(stack.size).toBe(1);

    expect(await stack.dispose()).toEqual([]);
    expect(dispose).toHaveBeenCalledTimes(2);
  });
});
