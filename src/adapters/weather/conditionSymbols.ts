// Provider condition codes mapped onto SF-Symbols-style names. Hourly cells
// append ".fill", so every name here must have a filled variant.

/** WMO weather interpretation codes, as used by Open-Meteo. */
export function symbolForWmoCode(code: number): string {
  if (code === 0) return 'sun.max';
  if (code === 1 || code === 2) return 'cloud.sun';
  if (code === 3) return 'cloud';
  if (code === 45 || code === 48) return 'cloud.fog';
  if (code >= 51 && code <= 57) return 'cloud.drizzle';
  if (code === 65 || (code >= 80 && code <= 82)) return 'cloud.heavyrain';
  if (code >= 61 && code <= 67) return 'cloud.rain';
  if ((code >= 71 && code <= 77) || code === 85 || code === 86) return 'cloud.snow';
  if (code >= 95 && code <= 99) return 'cloud.bolt.rain';
  return 'cloud';
}

/** OpenWeatherMap condition ids (2xx thunderstorm … 80x clouds). */
export function symbolForOpenWeatherId(id: number): string {
  if (id >= 200 && id < 300) return 'cloud.bolt.rain';
  if (id >= 300 && id < 400) return 'cloud.drizzle';
  if (id === 511) return 'cloud.sleet';
  if (id >= 502 && id <= 504) return 'cloud.heavyrain';
  if (id >= 500 && id < 600) return 'cloud.rain';
  if (id >= 600 && id < 700) return 'cloud.snow';
  if (id >= 700 && id < 800) return 'cloud.fog';
  if (id === 800) return 'sun.max';
  if (id === 801 || id === 802) return 'cloud.sun';
  return 'cloud';
}
