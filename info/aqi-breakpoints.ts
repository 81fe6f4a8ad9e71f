import type { BreakpointTable } from "../types/sensor";

/**
 * US EPA Air Quality Index breakpoints for particulate matter
 *
 * Source: EPA Technical Assistance Document for the Reporting of Daily Air
 * Quality (September 2018).
 *
 * Each pair is (concentration in μg/m³, AQI) at the lower edge of a category:
 *
 *   0 - 50    Good
 *   51 - 100  Moderate
 *   101 - 150 Unhealthy for Sensitive Groups
 *   151 - 200 Unhealthy
 *   201 - 300 Very Unhealthy
 *   301 - 500 Hazardous
 *
 * The EPA bases the index on 24-hour averages. This service reports the
 * instantaneous value instead; the difference stays small as long as readings
 * don't jump by more than ~20 μg/m³ within ten minutes.
 */

export const PM2_5_AQI_TABLE: BreakpointTable = Object.freeze([
  [0, 0],
  [12.1, 51],
  [35.5, 101],
  [55.5, 151],
  [150.5, 201],
  [250.5, 301],
  [350.5, 401],
] as const);

export const PM10_AQI_TABLE: BreakpointTable = Object.freeze([
  [0, 0],
  [55, 51],
  [155, 101],
  [255, 151],
  [355, 201],
  [425, 301],
  [505, 401],
] as const);

// Top of the published scale.
export const AQI_CEILING = 500;
