import { describe, it, expect } from 'vitest';
import { symbolForOpenWeatherId, symbolForWmoCode } from '../../adapters/weather/conditionSymbols.js';

describe('symbolForWmoCode', () => {
  it('maps clear, cloudy and precipitation codes', () => {
    expect(symbolForWmoCode(0)).toBe('sun.max');
    expect(symbolForWmoCode(2)).toBe('cloud.sun');
    expect(symbolForWmoCode(3)).toBe('cloud');
    expect(symbolForWmoCode(45)).toBe('cloud.fog');
    expect(symbolForWmoCode(53)).toBe('cloud.drizzle');
    expect(symbolForWmoCode(63)).toBe('cloud.rain');
    expect(symbolForWmoCode(65)).toBe('cloud.heavyrain');
    expect(symbolForWmoCode(81)).toBe('cloud.heavyrain');
    expect(symbolForWmoCode(86)).toBe('cloud.snow');
    expect(symbolForWmoCode(96)).toBe('cloud.bolt.rain');
  });

  it('falls back to cloud for unknown codes', () => {
    expect(symbolForWmoCode(-1)).toBe('cloud');
  });
});

describe('symbolForOpenWeatherId', () => {
  it('maps condition groups', () => {
    expect(symbolForOpenWeatherId(211)).toBe('cloud.bolt.rain');
    expect(symbolForOpenWeatherId(301)).toBe('cloud.drizzle');
    expect(symbolForOpenWeatherId(511)).toBe('cloud.sleet');
    expect(symbolForOpenWeatherId(503)).toBe('cloud.heavyrain');
    expect(symbolForOpenWeatherId(520)).toBe('cloud.rain');
    expect(symbolForOpenWeatherId(601)).toBe('cloud.snow');
    expect(symbolForOpenWeatherId(781)).toBe('cloud.fog');
    expect(symbolForOpenWeatherId(741)).toBe('cloud.fog');
    expect(symbolForOpenWeatherId(800)).toBe('sun.max');
    expect(symbolForOpenWeatherId(802)).toBe('cloud.sun');
    expect(symbolForOpenWeatherId(804)).toBe('cloud');
  });
});
