import { WATER_LEVEL_SERIES_KEY } from '@riverwatch/shared';
import type { FeedFrame, FeedMessage } from '@riverwatch/shared';

export interface SimulatedSample {
  /** Unix seconds */
  time: number;
  waterLevel: number | null;
  rainfall: number | null;
}

export interface StationProfile {
  code: string;
  name: string;
  basin: string;
  baseLevel: number;
  variance: number;
  warningLevel: number;
  criticalLevel: number;
}

export type Random = () => number;

/** Profile for stations the server has no fixed definition for */
export function defaultProfile(stationId: string): StationProfile {
  return {
    code: `STN${stationId.padStart(2, '0')}`,
    name: `Simulated station ${stationId}`,
    basin: 'Simulated basin',
    baseLevel: 2.5,
    variance: 0.6,
    warningLevel: 3.5,
    criticalLevel: 4.2,
  };
}

/**
 * Water level and rainfall history for one simulated station. Levels follow a
 * mean-reverting random walk around the profile's base level.
 */
export class SimulatedStation {
  private samples: SimulatedSample[] = [];
  private level: number;

  constructor(
    readonly id: string,
    readonly profile: StationProfile,
    private readonly historySize: number,
    private readonly random: Random = Math.random,
  ) {
    this.level = profile.baseLevel;
  }

  get history(): readonly SimulatedSample[] {
    return this.samples;
  }

  /** Append a sample as-is, keeping at most `historySize` */
  push(sample: SimulatedSample) {
    this.samples.push(sample);
    if (this.samples.length > this.historySize) {
      this.samples.splice(0, this.samples.length - this.historySize);
    }
  }

  /** Generate the next sample at `time` (unix seconds) */
  step(time: number): SimulatedSample {
    const { baseLevel, variance } = this.profile;
    const drift = (baseLevel - this.level) * 0.1; // mean-reverting
    const noise = (this.random() - 0.5) * variance * 0.4;
    this.level = Math.round((this.level + drift + noise) * 100) / 100;

    // Showers on roughly one sample in five
    const rainfall = this.random() < 0.2 ? Math.round(this.random() * 120) / 10 : 0;
    const sample: SimulatedSample = { time, waterLevel: this.level, rainfall };
    this.push(sample);
    return sample;
  }

  /** Pre-fill `count` samples spaced `stepSeconds` apart, ending at `endTime` */
  backfill(count: number, stepSeconds: number, endTime: number) {
    for (let i = count - 1; i >= 0; i--) {
      this.step(endTime - i * stepSeconds);
    }
  }

  message(): FeedMessage {
    const { code, name, basin, warningLevel, criticalLevel } = this.profile;
    const time = this.samples.map(s => s.time);
    return {
      code,
      name,
      basin: { name: basin },
      water_level_warning: warningLevel,
      water_level_critical: criticalLevel,
      values: {
        water_level_graph: {
          [WATER_LEVEL_SERIES_KEY]: { time, value: this.samples.map(s => s.waterLevel) },
        },
        rain_graph: { time, value: this.samples.map(s => s.rainfall) },
      },
    };
  }

  frame(): FeedFrame {
    return { message: this.message() };
  }
}
