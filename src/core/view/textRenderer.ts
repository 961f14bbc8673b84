import type { ForecastScreen } from './ForecastPresenter.js';

function pad(value: string, width: number): string {
  return value.padEnd(width, ' ');
}

export function renderForecastText(screen: ForecastScreen): string {
  const lines: string[] = [screen.title, screen.currentTemperature, '', screen.hourly.heading];

  for (const item of screen.hourly.items) {
    lines.push(`${pad(item.label, 5)} ${pad(item.symbol, 20)} ${item.temperature}`);
  }

  lines.push('', screen.tenDay.heading);
  for (const row of screen.tenDay.rows) {
    lines.push(`${pad(row.day, 4)} ${pad(row.symbol, 20)} ${pad(row.low, 6)} ${row.high}`);
  }

  return `${lines.join('\n')}\n`;
}
