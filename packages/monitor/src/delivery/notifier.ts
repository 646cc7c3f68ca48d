import axios, { AxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import { randomUUID } from 'node:crypto';
import { NotifyError, errorMessage } from '@riverwatch/shared';

export interface Notifier {
  notify(stationCode: string, imageUrl: string, signal?: AbortSignal): Promise<void>;
}

export interface LineCredentials {
  url: string;
  groupId: string;
  apiKey: string;
}

export interface LineImageMessage {
  type: 'image';
  originalContentUrl: string;
  previewImageUrl: string;
}

export interface LinePushRequest {
  to: string;
  messages: LineImageMessage[];
}

export const LINE_TIMEOUT_MS = 10_000;

export function buildPushRequest(groupId: string, imageUrl: string): LinePushRequest {
  return {
    to: groupId,
    messages: [{ type: 'image', originalContentUrl: imageUrl, previewImageUrl: imageUrl }],
  };
}

/**
 * Pushes a chart image to a LINE group. Each call carries a fresh
 * X-Line-Retry-Key so the platform can drop replays of the same push.
 */
export class LineNotifier implements Notifier {
  private readonly http: Pick<AxiosInstance, 'post'>;

  constructor(
    private readonly credentials: LineCredentials,
    http?: Pick<AxiosInstance, 'post'>,
    private readonly retryKey: () => string = randomUUID,
  ) {
    this.http = http ?? axios.create({ timeout: LINE_TIMEOUT_MS });
  }

  async notify(stationCode: string, imageUrl: string, signal?: AbortSignal): Promise<void> {
    const { url, groupId, apiKey } = this.credentials;
    try {
      await this.http.post(url, buildPushRequest(groupId, imageUrl), {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
          'X-Line-Retry-Key': this.retryKey(),
        },
        signal,
      });
    } catch (err) {
      if (err instanceof AxiosError) {
        const status = err.response?.status;
        const body = err.response ? JSON.stringify(err.response.data) : err.message;
        throw new NotifyError(
          `LINE push for station ${stationCode} failed${status ? ` with ${status}` : ''}: ${body}`,
          status,
          { cause: err },
        );
      }
      throw new NotifyError(`LINE push for station ${stationCode} failed: ${errorMessage(err)}`, undefined, { cause: err });
    }
  }
}
