import {
  Area,
  Bar,
  BarChart,
  CartesianGrid,
  ComposedChart,
  ReferenceArea,
  ReferenceLine,
  XAxis,
  YAxis,
} from 'recharts';
import type { StationMeta, StationSnapshot } from '@riverwatch/shared';

export const CHART_WIDTH = 1400;
export const CHART_HEIGHT = 1000;

/** Bars kept on the rainfall panel */
const MAX_RAIN_BARS = 100;

const COLORS = {
  level: '#2E86AB',
  warning: '#F77F00',
  critical: '#D62828',
  rain: '#06A77D',
  rainEdge: '#05846A',
  grid: '#d1d5db',
  axis: '#374151',
  muted: '#9ca3af',
};

const LABELS = {
  levelAxis: 'ระดับน้ำ (m)',
  warning: 'ระดับเฝ้าระวัง',
  critical: 'ระดับวิกฤต',
  rainAxis: 'ปริมาณน้ำฝน (mm)',
  timeAxis: 'เวลา (Time)',
  noRain: 'ไม่มีข้อมูลฝน (No Rainfall Data)',
  noLevel: 'ไม่มีข้อมูลระดับน้ำ (No Water Level Data)',
};

const FONT_FAMILY = "Sarabun, 'Noto Sans Thai', 'DejaVu Sans', sans-serif";

const LEVEL_PANEL = { top: 70, height: 540 };
const RAIN_PANEL = { top: 620, height: 340 };
const PANEL_MARGIN = { top: 16, right: 40, bottom: 8, left: 30 };

export function chartTitle(meta: StationMeta): string {
  return meta.basin ? `${meta.code} - ${meta.name} (${meta.basin})` : `${meta.code} - ${meta.name}`;
}

const axisFormatters = new Map<string, Intl.DateTimeFormat>();

/** `[YYYY-MM-DD, HH:mm]` in the given IANA zone. */
export function formatAxisTime(timestamp: number, timeZone: string): [string, string] {
  let fmt = axisFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    axisFormatters.set(timeZone, fmt);
  }
  const parts: Record<string, string> = {};
  for (const part of fmt.formatToParts(new Date(timestamp))) parts[part.type] = part.value;
  return [`${parts.year}-${parts.month}-${parts.day}`, `${parts.hour}:${parts.minute}`];
}

/** Evenly spaced time ticks (epoch ms), including both ends when span > 0. */
export function timeTicks(start: number, end: number, count = 6): number[] {
  if (end <= start) return [start];
  const step = (end - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => Math.round(start + i * step));
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Y range covering the readings and thresholds with 10% headroom; a flat series gets a unit band. */
export function levelDomain(levels: readonly number[], thresholds: readonly number[] = []): [number, number] {
  let lo = Math.min(...levels, ...thresholds);
  let hi = Math.max(...levels, ...thresholds);
  if (hi === lo) {
    lo -= 0.5;
    hi += 0.5;
  }
  const pad = (hi - lo) * 0.1;
  return [round2(lo - pad), round2(hi + pad)];
}

export interface RainBar {
  timestamp: number;
  rainfall: number;
}

/** Non-zero rainfall samples, newest `MAX_RAIN_BARS` only. */
export function rainBars(records: StationSnapshot): RainBar[] {
  return records
    .flatMap(r => (r.rainfall !== undefined && r.rainfall > 0 ? [{ timestamp: r.timestamp, rainfall: r.rainfall }] : []))
    .slice(-MAX_RAIN_BARS);
}

export function timeDomain(records: StationSnapshot): [number, number] {
  if (records.length === 0) return [0, 0];
  return [records[0].timestamp, records[records.length - 1].timestamp];
}

interface TimeTickProps {
  x?: number;
  y?: number;
  payload?: { value: number };
  timeZone: string;
}

function TimeTick({ x = 0, y = 0, payload, timeZone }: TimeTickProps) {
  if (!payload) return null;
  const [date, time] = formatAxisTime(payload.value, timeZone);
  return (
    <text x={x} y={y + 12} textAnchor="middle" fontSize={12} fill={COLORS.axis}>
      <tspan x={x} dy={0}>{date}</tspan>
      <tspan x={x} dy={16}>{time}</tspan>
    </text>
  );
}

interface PanelProps {
  records: StationSnapshot;
  timeZone: string;
}

/** Water level area with warning/critical zones and threshold lines. */
export function WaterLevelChart({ meta, records, timeZone }: PanelProps & { meta: StationMeta }) {
  const { warningLevel, criticalLevel } = meta;
  const levels = records.flatMap(r => (r.waterLevel === undefined ? [] : [r.waterLevel]));
  const thresholds = [warningLevel, criticalLevel].flatMap(v => (v === undefined ? [] : [v]));
  const [yMin, yMax] = levelDomain(levels, thresholds);
  const [start, end] = timeDomain(records);
  const data = records.map(r => ({ timestamp: r.timestamp, waterLevel: r.waterLevel ?? null }));

  return (
    <ComposedChart width={CHART_WIDTH} height={LEVEL_PANEL.height} data={data} margin={PANEL_MARGIN}>
      <defs>
        <linearGradient id="level-fill" x1="0" y1="0" x2="0" y2="1">
          <stop offset="0%" stopColor={COLORS.level} stopOpacity={0.4} />
          <stop offset="100%" stopColor={COLORS.level} stopOpacity={0.05} />
        </linearGradient>
      </defs>
      <CartesianGrid stroke={COLORS.grid} strokeDasharray="2 3" />
      <XAxis
        dataKey="timestamp"
        type="number"
        domain={[start, end]}
        ticks={timeTicks(start, end)}
        interval={0}
        height={44}
        tick={<TimeTick timeZone={timeZone} />}
      />
      <YAxis
        type="number"
        domain={[yMin, yMax]}
        width={70}
        allowDataOverflow
        label={{ value: LABELS.levelAxis, angle: -90, position: 'insideLeft', fill: COLORS.axis }}
      />
      {warningLevel !== undefined && criticalLevel !== undefined && criticalLevel > warningLevel && (
        <ReferenceArea y1={warningLevel} y2={criticalLevel} fill={COLORS.warning} fillOpacity={0.12} />
      )}
      {criticalLevel !== undefined && (
        <ReferenceArea y1={criticalLevel} y2={yMax} fill={COLORS.critical} fillOpacity={0.12} />
      )}
      <Area
        type="linear"
        dataKey="waterLevel"
        stroke={COLORS.level}
        strokeWidth={2.5}
        fill="url(#level-fill)"
        connectNulls={false}
        isAnimationActive={false}
      />
      {warningLevel !== undefined && (
        <ReferenceLine
          y={warningLevel}
          stroke={COLORS.warning}
          strokeWidth={2}
          strokeDasharray="8 5"
          label={{ value: `${LABELS.warning} (${warningLevel}m)`, position: 'insideTopRight', fill: COLORS.warning, fontSize: 12 }}
        />
      )}
      {criticalLevel !== undefined && (
        <ReferenceLine
          y={criticalLevel}
          stroke={COLORS.critical}
          strokeWidth={2}
          strokeDasharray="8 5"
          label={{ value: `${LABELS.critical} (${criticalLevel}m)`, position: 'insideTopRight', fill: COLORS.critical, fontSize: 12 }}
        />
      )}
    </ComposedChart>
  );
}

/** Rainfall bars on the same time axis as the level panel. */
export function RainfallChart({ records, timeZone }: PanelProps) {
  const bars = rainBars(records);
  const [start, end] = timeDomain(records);
  const plotWidth = CHART_WIDTH - PANEL_MARGIN.left - PANEL_MARGIN.right - 70;
  const barSize = Math.max(2, Math.min(12, plotWidth / Math.max(bars.length, 1) / 2));

  return (
    <BarChart width={CHART_WIDTH} height={RAIN_PANEL.height} data={bars} margin={PANEL_MARGIN}>
      <CartesianGrid stroke={COLORS.grid} strokeDasharray="2 3" />
      <XAxis
        dataKey="timestamp"
        type="number"
        domain={[start, end]}
        ticks={timeTicks(start, end)}
        interval={0}
        height={44}
        tick={<TimeTick timeZone={timeZone} />}
      />
      <YAxis
        type="number"
        domain={[0, 'auto']}
        width={70}
        label={{ value: LABELS.rainAxis, angle: -90, position: 'insideLeft', fill: COLORS.axis }}
      />
      <Bar
        dataKey="rainfall"
        barSize={barSize}
        fill={COLORS.rain}
        fillOpacity={0.7}
        stroke={COLORS.rainEdge}
        strokeWidth={0.8}
        isAnimationActive={false}
      />
    </BarChart>
  );
}

function Placeholder({ top, height, label }: { top: number; height: number; label: string }) {
  return (
    <g>
      <rect x={100} y={top} width={CHART_WIDTH - 140} height={height - 60} fill="none" stroke={COLORS.axis} />
      <text x={CHART_WIDTH / 2} y={top + height / 2} textAnchor="middle" fontSize={16} fill={COLORS.muted}>
        {label}
      </text>
    </g>
  );
}

interface StationChartProps {
  meta: StationMeta;
  /** Pre-rendered `<svg>` surface of each panel, or null when it has no data */
  levelPanel: string | null;
  rainPanel: string | null;
}

/** Two-panel station dashboard: water level with alert zones over rainfall bars. */
export function StationChart({ meta, levelPanel, rainPanel }: StationChartProps) {
  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={CHART_WIDTH}
      height={CHART_HEIGHT}
      viewBox={`0 0 ${CHART_WIDTH} ${CHART_HEIGHT}`}
      fontFamily={FONT_FAMILY}
    >
      <rect width={CHART_WIDTH} height={CHART_HEIGHT} fill="#ffffff" />
      <text x={CHART_WIDTH / 2} y={44} textAnchor="middle" fontSize={24} fontWeight="bold" fill="#111827">
        {chartTitle(meta)}
      </text>
      {levelPanel === null ? (
        <Placeholder top={LEVEL_PANEL.top} height={LEVEL_PANEL.height} label={LABELS.noLevel} />
      ) : (
        <g transform={`translate(0 ${LEVEL_PANEL.top})`} dangerouslySetInnerHTML={{ __html: levelPanel }} />
      )}
      {rainPanel === null ? (
        <Placeholder top={RAIN_PANEL.top} height={RAIN_PANEL.height} label={LABELS.noRain} />
      ) : (
        <g transform={`translate(0 ${RAIN_PANEL.top})`} dangerouslySetInnerHTML={{ __html: rainPanel }} />
      )}
      <text x={CHART_WIDTH / 2} y={CHART_HEIGHT - 12} textAnchor="middle" fontSize={14} fontWeight="bold" fill={COLORS.axis}>
        {LABELS.timeAxis}
      </text>
    </svg>
  );
}
