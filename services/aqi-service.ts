import {
  AQI_CEILING,
  PM10_AQI_TABLE,
  PM2_5_AQI_TABLE,
} from "../info/aqi-breakpoints";
import type {
  AqiPollutant,
  AqiResult,
  BreakpointTable,
} from "../types/sensor";

export const AQANDU_SLOPE = 0.778;
export const AQANDU_INTERCEPT = 2.65;

/**
 * Interpolate an AQI value from a PM concentration.
 *
 * Past the top breakpoint there is no upper bound to interpolate towards, so
 * the upper point stays at (0, 0) and the top bucket is extended along the
 * line through its lower breakpoint and the origin. The 500 ceiling caps it.
 */
export function computeAqi(concentration: number, table: BreakpointTable): number {
  if (concentration < 0) {
    return 0;
  }

  let pmLow = 0;
  let aqiLow = 0;
  let pmHigh = 0;
  let aqiHigh = 0;

  for (const [pm, aqi] of table) {
    if (pm > concentration) {
      pmHigh = pm;
      aqiHigh = aqi;
      break;
    }
    pmLow = pm;
    aqiLow = aqi;
  }

  // Zero-width bucket: nothing to interpolate across.
  if (pmHigh === pmLow) {
    return AQI_CEILING;
  }

  const aqi =
    ((aqiHigh - aqiLow) * (concentration - pmLow)) / (pmHigh - pmLow) + aqiLow;

  return aqi > AQI_CEILING ? AQI_CEILING : aqi;
}

// AQandU calibration for PurpleAir PA-II sensors, applied to raw PM before
// the table lookup.
export function aqandu(pm: number): number {
  return AQANDU_SLOPE * pm + AQANDU_INTERCEPT;
}

export function tableFor(pollutant: AqiPollutant): BreakpointTable {
  return pollutant === "pm2_5" ? PM2_5_AQI_TABLE : PM10_AQI_TABLE;
}

/** Uncorrected and AQandU-corrected AQI for one reading. */
export function computeAqiResults(
  concentration: number,
  table: BreakpointTable
): AqiResult[] {
  return [
    { value: computeAqi(concentration, table), conversion: "" },
    { value: computeAqi(aqandu(concentration), table), conversion: "AQandU" },
  ];
}
