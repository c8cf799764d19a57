import { useMemo } from 'react';
import { Line } from 'react-chartjs-2';
import { Chart as ChartJS, Filler, LinearScale, LineController, LineElement, PointElement, Tooltip } from 'chart.js';
import type { ChartData, ChartOptions, TooltipItem } from 'chart.js';
import { SeriesPoint } from '../types/statements';
import { formatAxisValue } from '../utils/formatters';

ChartJS.register(LineController, LinearScale, PointElement, LineElement, Filler, Tooltip);

type Props = {
  data: SeriesPoint[];
  yLabel: string;
  xLabel?: string;
  xTickInterval?: number;
  // Regulatory minimum, drawn as a dashed line across the run.
  threshold?: number;
  // Period of the first breach, marked on the series.
  breachPeriod?: number;
};

interface Palette {
  line: string;
  fill: string;
  grid: string;
  text: string;
  danger: string;
}

const cssVar = (name: string, fallback: string): string => {
  if (typeof window === 'undefined') return fallback;
  return getComputedStyle(document.documentElement).getPropertyValue(name).trim() || fallback;
};

// Six-digit hex only; anything else falls back to a neutral tint.
const withAlpha = (hex: string, alpha: number): string => {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) return `rgba(0, 127, 166, ${alpha})`;
  const [r, g, b] = match.slice(1).map((part) => parseInt(part, 16));
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
};

const usePalette = (): Palette =>
  useMemo(() => {
    const line = cssVar('--accent', '#007fa6');
    return {
      line,
      fill: withAlpha(line, 0.15),
      grid: cssVar('--border', '#d6d6d6'),
      text: cssVar('--dim', '#6b6b6b'),
      danger: cssVar('--danger', '#c0392b'),
    };
  }, []);

const TimeSeriesChart = ({ data, yLabel, xLabel = 'Period', xTickInterval = 5, threshold, breachPeriod }: Props) => {
  const palette = usePalette();
  const points = useMemo(
    () => data.filter((p) => Number.isFinite(p.value)).sort((a, b) => a.step - b.step),
    [data]
  );

  const chartData = useMemo((): ChartData<'line', { x: number; y: number }[]> => {
    const first = points[0];
    const last = points[points.length - 1];
    const breachPoint = points.find((p) => p.step === breachPeriod);
    return {
      datasets: [
        {
          label: yLabel,
          data: points.map((p) => ({ x: p.step, y: p.value })),
          borderColor: palette.line,
          backgroundColor: palette.fill,
          borderWidth: 2,
          pointRadius: points.length === 1 ? 3 : 0,
          tension: 0.2,
          fill: 'start',
        },
        ...(threshold !== undefined && first && last
          ? [
              {
                label: 'Minimum',
                data: [
                  { x: first.step, y: threshold },
                  { x: last.step, y: threshold },
                ],
                borderColor: palette.danger,
                borderDash: [6, 4],
                borderWidth: 1,
                pointRadius: 0,
                fill: false,
              },
            ]
          : []),
        ...(breachPoint
          ? [
              {
                label: 'Breach',
                data: [{ x: breachPoint.step, y: breachPoint.value }],
                borderColor: palette.danger,
                backgroundColor: palette.danger,
                pointRadius: 5,
                showLine: false,
              },
            ]
          : []),
      ],
    };
  }, [palette, points, threshold, breachPeriod, yLabel]);

  const options = useMemo(
    (): ChartOptions<'line'> => ({
      responsive: true,
      maintainAspectRatio: false,
      animation: false,
      interaction: { mode: 'nearest', intersect: false },
      plugins: {
        legend: { display: false },
        tooltip: {
          callbacks: {
            title: (items: TooltipItem<'line'>[]) => (items.length ? `${xLabel} ${items[0].parsed.x}` : ''),
            label: (item: TooltipItem<'line'>) =>
              `${item.dataset.label ?? yLabel}: ${formatAxisValue(item.parsed.y, yLabel)}`,
          },
        },
      },
      scales: {
        x: {
          type: 'linear',
          title: { display: true, text: xLabel, color: palette.text, font: { size: 10 } },
          grid: { color: palette.grid },
          ticks: { color: palette.text, stepSize: xTickInterval > 0 ? xTickInterval : undefined, precision: 0 },
        },
        y: {
          title: { display: true, text: yLabel, color: palette.text, font: { size: 10 } },
          grid: { color: palette.grid },
          ticks: {
            color: palette.text,
            maxTicksLimit: 5,
            callback: (value) => formatAxisValue(Number(value), yLabel),
          },
        },
      },
    }),
    [palette, xLabel, xTickInterval, yLabel]
  );

  if (points.length === 0) {
    return (
      <div className="series-chart empty">
        <div className="muted">No periods yet - run a scenario to build a trend.</div>
      </div>
    );
  }

  return (
    <div className="series-chart">
      <div className="series-canvas">
        <Line data={chartData} options={options} />
      </div>
    </div>
  );
};

export default TimeSeriesChart;
