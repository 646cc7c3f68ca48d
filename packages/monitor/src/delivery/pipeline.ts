import { RiverwatchError, errorMessage } from '@riverwatch/shared';
import type { CycleOutcome, CycleStatus, Logger, StationMeta } from '@riverwatch/shared';
import type { ChartRenderer } from './renderer.js';
import type { ImageUploader } from './uploader.js';
import type { Notifier } from './notifier.js';

export interface DeliveryCollaborators {
  renderer: ChartRenderer;
  /** Absent when notifications are disabled */
  uploader: ImageUploader | null;
  notifier: Notifier | null;
}

/**
 * Render, upload and notify for one approved cycle. Failures are logged and
 * reported as `failed`; nothing is queued for the next cycle.
 */
export class DeliveryPipeline {
  constructor(
    private readonly collaborators: DeliveryCollaborators,
    private readonly logger: Logger,
  ) {}

  async run(outcome: CycleOutcome, meta: StationMeta, signal: AbortSignal): Promise<CycleStatus> {
    const { stationCode, windowSnapshot } = outcome;
    const { renderer, uploader, notifier } = this.collaborators;
    try {
      const artifact = await renderer.render(stationCode, meta, windowSnapshot);
      this.logger.info(`Chart saved to ${artifact.path}`);
      if (!outcome.shouldNotify) return 'rendered';

      if (!uploader || !notifier) {
        this.logger.warn('Notification approved but no uploader/notifier is configured');
        return 'rendered';
      }
      if (signal.aborted) return 'rendered';

      const imageUrl = await uploader.upload(stationCode, artifact);
      this.logger.info(`Uploaded chart: ${imageUrl}`);
      if (signal.aborted) return 'rendered';

      await notifier.notify(stationCode, imageUrl, signal);
      this.logger.info(`Sent chart to LINE for station ${stationCode}`);
      return 'notified';
    } catch (err) {
      const label = err instanceof RiverwatchError ? err.name : 'Error';
      this.logger.error(`${label}: ${errorMessage(err)}`);
      return 'failed';
    }
  }
}
