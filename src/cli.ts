import { parseArgs } from "util";
import { addDays } from "date-fns";
import { createCalendarSet, getWeekWindow } from "@/lib/calendar-engine";
import { ScheduleConfigError } from "@/lib/errors";
import { renderScheduleTable, renderStatsTable, writeScheduleCsv, writeScheduleWorkbook } from "@/lib/export-engine";
import { computeHolidaysForRange } from "@/lib/holidays";
import { loadDateSet, loadRoster, loadUnavailability, parseISODateToken, shuffleRoster } from "@/lib/input-engine";
import { promptHorizonOnTerminal } from "@/lib/prompt-engine";
import { buildSchedule } from "@/lib/schedule-engine";
import { defaultSettings, loadSettingsFile, resolveSettings, type SettingsOverrides } from "@/lib/settings-engine";
import { validateSettings } from "@/lib/settings-validation";
import { analyzeSchedule } from "@/lib/stats-engine";

const USAGE = `Usage: oncall-rotation [options]

  --config <file>          JSON settings file
  --team <file>            roster, one name per line (default team.txt)
  --holidays <file>        holiday dates, YYYY-MM-DD per line (default holidays.txt)
  --patching <file>        patching dates, YYYY-MM-DD per line (default patching.txt)
  --unavailability <file>  Name,YYYY-MM-DD per line (default unavailability.txt)
  --start <YYYY-MM-DD>     first week (default today)
  --weeks <n>              number of weeks (default 12)
  --csv <file>             CSV output (default oncall_schedule.csv)
  --xlsx <file>            also write an Excel workbook
  --builtin-holidays       add US federal holidays to the holiday list
  --no-shuffle             keep roster file order
  -i, --interactive        prompt for start date and number of weeks
  -h, --help               show this message`;

function flagOverrides(values: {
  team?: string;
  holidays?: string;
  patching?: string;
  unavailability?: string;
  start?: string;
  weeks?: string;
  csv?: string;
  xlsx?: string;
  "builtin-holidays"?: boolean;
  "no-shuffle"?: boolean;
}): SettingsOverrides {
  return {
    teamFile: values.team,
    holidaysFile: values.holidays,
    patchingFile: values.patching,
    unavailabilityFile: values.unavailability,
    startDate: values.start,
    numWeeks: values.weeks === undefined ? undefined : Number(values.weeks),
    csvFile: values.csv,
    xlsxFile: values.xlsx,
    builtInHolidays: values["builtin-holidays"] ? true : undefined,
    shuffle: values["no-shuffle"] ? false : undefined,
  };
}

async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string" },
      team: { type: "string" },
      holidays: { type: "string" },
      patching: { type: "string" },
      unavailability: { type: "string" },
      start: { type: "string" },
      weeks: { type: "string" },
      csv: { type: "string" },
      xlsx: { type: "string" },
      "builtin-holidays": { type: "boolean" },
      "no-shuffle": { type: "boolean" },
      interactive: { type: "boolean", short: "i" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const fileLayer = values.config ? loadSettingsFile(values.config) : {};
  let settings = resolveSettings(defaultSettings(), fileLayer, flagOverrides(values));

  if (values.interactive) {
    const horizon = await promptHorizonOnTerminal({ startDate: settings.startDate, numWeeks: settings.numWeeks });
    settings = resolveSettings(settings, horizon);
  }

  const validation = validateSettings(settings);
  validation.warnings.forEach((w) => console.warn(`Warning: ${w}`));
  if (!validation.valid) {
    throw new ScheduleConfigError(validation.errors.join("; "));
  }

  const startDate = parseISODateToken(settings.startDate);
  if (!startDate) {
    throw new ScheduleConfigError(`Invalid start date: ${settings.startDate}`);
  }

  const team = loadRoster(settings.teamFile);
  const roster = settings.shuffle ? shuffleRoster(team) : team;
  const holidays = new Set(loadDateSet(settings.holidaysFile));
  if (settings.builtInHolidays && settings.numWeeks > 0) {
    const first = getWeekWindow(startDate).start;
    const last = addDays(first, settings.numWeeks * 7 - 1);
    computeHolidaysForRange(first, last).forEach((h) => holidays.add(h.date));
  }
  const calendar = createCalendarSet({
    holidays,
    patching: loadDateSet(settings.patchingFile),
    unavailability: loadUnavailability(settings.unavailabilityFile),
  });

  console.log(`Loaded ${roster.length} team members, ${holidays.size} holidays, ${calendar.patching.size} patching dates`);

  const result = buildSchedule(roster, startDate, settings.numWeeks, calendar);
  const stats = analyzeSchedule(result.schedule, roster);

  console.log("");
  console.log(renderScheduleTable(result.schedule));
  console.log("");
  console.log(renderStatsTable(stats));

  writeScheduleCsv(result.schedule, settings.csvFile);
  console.log(`\nSchedule written to ${settings.csvFile}`);

  if (settings.xlsxFile) {
    await writeScheduleWorkbook(result.schedule, stats, settings.xlsxFile);
    console.log(`Workbook written to ${settings.xlsxFile}`);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exitCode = 1;
});
