import { DeadlineExceededError, describeError, withDeadline } from './util';

describe('withDeadline', () => {
  it('resolves with the value of an operation that settles in time', async () => {
    await expect(withDeadline(Promise.resolve('done'), 50, 'Lookup')).resolves.toBe(
      'done',
    );
  });

  it('rejects with DeadlineExceededError when the operation never settles', async () => {
    const pending = new Promise<string>(() => undefined);

    const result = withDeadline(pending, 10, 'Lookup of queue scrape-a');

    await expect(result).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(result).rejects.toThrow(
      'Lookup of queue scrape-a timed out after 10ms',
    );
  });

  it('passes through the failure of the operation', async () => {
    const failure = new Error('connection refused');

    await expect(
      withDeadline(Promise.reject(failure), 50, 'Write'),
    ).rejects.toBe(failure);
  });
});

describe('describeError', () => {
  it('uses the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain failure')).toBe('plain failure');
    expect(describeError(42)).toBe('42');
  });
});
