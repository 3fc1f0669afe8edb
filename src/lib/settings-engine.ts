import fs from "fs";
import { z } from "zod";
import { toISODate } from "@/lib/calendar-engine";
import { ScheduleConfigError } from "@/lib/errors";

export interface RunSettings {
  version: 1;

  // INPUT FILES
  teamFile: string;
  holidaysFile: string;
  patchingFile: string;
  unavailabilityFile: string;

  // HORIZON
  startDate: string; // ISO YYYY-MM-DD, normalized to its Monday when scheduling
  numWeeks: number;

  // ROTATION
  shuffle: boolean;
  builtInHolidays: boolean;

  // OUTPUT
  csvFile: string;
  xlsxFile?: string;
}

export const DEFAULT_NUM_WEEKS = 12;

export function defaultSettings(today: Date = new Date()): RunSettings {
  return {
    version: 1,
    teamFile: "team.txt",
    holidaysFile: "holidays.txt",
    patchingFile: "patching.txt",
    unavailabilityFile: "unavailability.txt",
    startDate: toISODate(today),
    numWeeks: DEFAULT_NUM_WEEKS,
    shuffle: true,
    builtInHolidays: false,
    csvFile: "oncall_schedule.csv",
  };
}

const settingsFileSchema = z
  .object({
    version: z.literal(1).optional(),
    teamFile: z.string().min(1),
    holidaysFile: z.string().min(1),
    patchingFile: z.string().min(1),
    unavailabilityFile: z.string().min(1),
    startDate: z.string(),
    numWeeks: z.number(),
    shuffle: z.boolean(),
    builtInHolidays: z.boolean(),
    csvFile: z.string().min(1),
    xlsxFile: z.string().min(1),
  })
  .partial()
  .strict();

export type SettingsOverrides = z.infer<typeof settingsFileSchema>;

export function parseSettingsFile(raw: string, source = "settings"): SettingsOverrides {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ScheduleConfigError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = settingsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ScheduleConfigError(`${source} is invalid - ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadSettingsFile(file: string): SettingsOverrides {
  if (!fs.existsSync(file)) {
    throw new ScheduleConfigError(`Settings file not found: ${file}`);
  }
  return parseSettingsFile(fs.readFileSync(file, "utf-8"), file);
}

// Later layers win; undefined values never override
export function resolveSettings(base: RunSettings, ...layers: SettingsOverrides[]): RunSettings {
  const result: RunSettings = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(result, { [key]: value });
    }
  }
  return { ...result, version: 1 };
}
