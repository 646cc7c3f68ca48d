import { createElement } from 'react';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RenderError, errorMessage } from '@riverwatch/shared';
import type { StationMeta, StationSnapshot } from '@riverwatch/shared';
import { RainfallChart, StationChart, WaterLevelChart, rainBars } from './StationChart.js';

export interface ChartArtifact {
  path: string;
  contentType: string;
}

export interface ChartRenderer {
  render(stationCode: string, meta: StationMeta, records: StationSnapshot): Promise<ChartArtifact>;
}

/**
 * The `<svg>` surface of a rendered recharts chart. recharts wraps it in an
 * HTML div, which has no place inside an SVG document.
 */
export function chartSurface(markup: string): string {
  const start = markup.indexOf('<svg');
  const end = markup.lastIndexOf('</svg>');
  if (start < 0 || end < start) throw new Error('Chart markup contains no <svg> element');
  return markup.slice(start, end + '</svg>'.length);
}

function renderPanel(chart: ReactElement): string {
  return chartSurface(renderToStaticMarkup(chart));
}

/** Standalone SVG document for a station snapshot. */
export function renderChartSvg(meta: StationMeta, records: StationSnapshot, timeZone: string): string {
  const hasLevels = records.some(r => r.waterLevel !== undefined);
  const levelPanel = hasLevels ? renderPanel(createElement(WaterLevelChart, { meta, records, timeZone })) : null;
  const rainPanel = rainBars(records).length > 0 ? renderPanel(createElement(RainfallChart, { records, timeZone })) : null;

  const markup = renderToStaticMarkup(createElement(StationChart, { meta, levelPanel, rainPanel }));
  return `<?xml version="1.0" encoding="UTF-8"?>\n${markup}\n`;
}

/** Writes `station_{code}.svg` into the graph directory, replacing the previous chart. */
export class SvgChartRenderer implements ChartRenderer {
  constructor(
    private readonly graphDir: string,
    private readonly timeZone: string,
  ) {}

  async render(stationCode: string, meta: StationMeta, records: StationSnapshot): Promise<ChartArtifact> {
    const path = join(this.graphDir, `station_${stationCode}.svg`);
    try {
      const svg = renderChartSvg(meta, records, this.timeZone);
      await mkdir(this.graphDir, { recursive: true });
      await writeFile(path, svg, 'utf8');
    } catch (err) {
      throw new RenderError(`Cannot render chart for station ${stationCode}: ${errorMessage(err)}`, { cause: err });
    }
    return { path, contentType: 'image/svg+xml' };
  }
}
