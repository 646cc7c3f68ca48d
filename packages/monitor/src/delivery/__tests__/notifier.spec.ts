import { describe, it, expect, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import { NotifyError } from '@riverwatch/shared';
import { LineNotifier, buildPushRequest } from '../notifier.js';

const credentials = { url: 'https://line.example.test/v2/bot/message/push', groupId: 'test-group', apiKey: 'test-secret' };
const imageUrl = 'https://images.example.test/water_level_station_703.png';

function setup() {
  const post = vi.fn();
  const notifier = new LineNotifier(credentials, { post }, () => 'retry-key-1');
  return { post, notifier };
}

async function notifyError(promise: Promise<void>): Promise<NotifyError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof NotifyError) return err;
    throw err;
  }
  throw new Error('expected notify to fail');
}

describe('buildPushRequest', () => {
  it('sends the image as both original and preview', () => {
    expect(buildPushRequest('test-group', imageUrl)).toEqual({
      to: 'test-group',
      messages: [{ type: 'image', originalContentUrl: imageUrl, previewImageUrl: imageUrl }],
    });
  });
});

describe('LineNotifier', () => {
  it('posts the push request with bearer auth and a retry key', async () => {
    const { post, notifier } = setup();
    post.mockResolvedValue({ status: 200, data: {} });
    const signal = new AbortController().signal;

    await notifier.notify('703', imageUrl, signal);

    expect(post).toHaveBeenCalledWith(credentials.url, buildPushRequest('test-group', imageUrl), {
      headers: {
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-secret',
        'X-Line-Retry-Key': 'retry-key-1',
      },
      signal,
    });
  });

  it('reports the status and response body of a rejected push', async () => {
    const { post, notifier } = setup();
    const config = { headers: new AxiosHeaders() };
    post.mockRejectedValue(
      new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', config, undefined, {
        data: { message: 'The property, \'to\', in the request body is invalid' },
        status: 400,
        statusText: 'Bad Request',
        headers: {},
        config,
      }),
    );

    const err = await notifyError(notifier.notify('703', imageUrl));
    expect(err.status).toBe(400);
    expect(err.message).toBe(
      'LINE push for station 703 failed with 400: {"message":"The property, \'to\', in the request body is invalid"}',
    );
  });

  it('reports a timeout without a response', async () => {
    const { post, notifier } = setup();
    post.mockRejectedValue(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));

    const err = await notifyError(notifier.notify('703', imageUrl));
    expect(err.status).toBeUndefined();
    expect(err.message).toBe('LINE push for station 703 failed: timeout of 10000ms exceeded');
  });

  it('wraps other failures', async () => {
    const { post, notifier } = setup();
    post.mockRejectedValue(new Error('socket hang up'));

    const err = await notifyError(notifier.notify('703', imageUrl));
    expect(err.message).toBe('LINE push for station 703 failed: socket hang up');
    expect(err.cause).toEqual(new Error('socket hang up'));
  });
});
