import dotenv from "dotenv";

// Load environment variables from .env
dotenv.config();

export interface MergeConfig {
  includeDecimal: boolean;
  progressInterval: number;
}

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Read merge settings from the environment
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): MergeConfig => ({
  // Emit the from/to integer columns unless disabled
  includeDecimal: parseBoolean(env.GEOIP_MERGE_DECIMAL, true),
  // Log a progress line every N blocks
  progressInterval: parsePositiveInt(env.GEOIP_MERGE_PROGRESS_INTERVAL, 100000),
});

export const config = loadConfig();
