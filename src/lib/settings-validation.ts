import { parseISODateToken } from "@/lib/input-engine";
import type { RunSettings } from "./settings-engine";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const MAX_RECOMMENDED_WEEKS = 104;

export function validateSettings(settings: RunSettings): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Horizon validation
  if (!parseISODateToken(settings.startDate)) {
    errors.push(`Start date must be a valid YYYY-MM-DD date (got "${settings.startDate}")`);
  }
  if (!Number.isInteger(settings.numWeeks) || settings.numWeeks < 0) {
    errors.push(`Number of weeks must be a non-negative integer (got ${settings.numWeeks})`);
  } else if (settings.numWeeks === 0) {
    warnings.push("Number of weeks is 0; the schedule will be empty");
  } else if (settings.numWeeks > MAX_RECOMMENDED_WEEKS) {
    warnings.push(`Scheduling ${settings.numWeeks} weeks; horizons are typically at most ${MAX_RECOMMENDED_WEEKS} weeks`);
  }

  // Output validation
  if (!settings.csvFile.toLowerCase().endsWith(".csv")) {
    warnings.push(`CSV output file "${settings.csvFile}" does not end in .csv`);
  }
  if (settings.xlsxFile !== undefined && !settings.xlsxFile.toLowerCase().endsWith(".xlsx")) {
    errors.push(`Workbook output file must end in .xlsx (got "${settings.xlsxFile}")`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
