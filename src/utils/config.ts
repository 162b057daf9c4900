import { promises as fs } from 'fs';
import { z } from 'zod';
import { regexPredicate } from '../shared/eventClassifier';
import type { EventDefinition } from '../shared/eventClassifier';
import { REQUIRED_HEADER_GROUPS, compileTimestampFormat, namedGroupsOf } from '../shared/logLine';
import type { InstantParser } from '../shared/logLine';

export class ProfilerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProfilerConfigError';
  }
}

const eventSchema = z.object({
  name: z.string().trim().min(1),
  start_regex: z.string().min(1),
  end_regex: z.string().min(1),
  threshold_ms: z.number().nonnegative().optional()
});

/** Calendar year for timestamps that carry none; also validates `--year`. */
export const yearSchema = z.number().int().min(1970).max(9999);

const rawConfigSchema = z.object({
  log_header_pattern: z.string().min(1),
  time_format: z.string().min(1),
  year: yearSchema.optional(),
  events: z.array(eventSchema).min(1)
});

export type RawProfilerConfig = z.infer<typeof rawConfigSchema>;

export type ProfilerConfig = {
  headerPattern: RegExp;
  parseInstant: InstantParser;
  events: EventDefinition[];
};

export type ConfigOverrides = {
  year?: number;
};

function compileRegex(source: string, where: string): RegExp {
  try {
    return new RegExp(source);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ProfilerConfigError(`Invalid regular expression in ${where}: ${reason}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate parsed JSON and compile every pattern. Nothing here is lazy, so
 * a broken configuration fails before the first log line is read.
 */
export function compileProfilerConfig(input: unknown, overrides: ConfigOverrides = {}): ProfilerConfig {
  const parsed = rawConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ProfilerConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const raw = parsed.data;

  const headerPattern = compileRegex(raw.log_header_pattern, 'log_header_pattern');
  const groups = namedGroupsOf(headerPattern);
  const missing = REQUIRED_HEADER_GROUPS.filter(g => !groups.includes(g));
  if (missing.length) {
    throw new ProfilerConfigError(
      `log_header_pattern must declare named groups ${REQUIRED_HEADER_GROUPS.map(g => `(?<${g}>...)`).join(', ')}; missing: ${missing.join(', ')}`
    );
  }

  const year = overrides.year ?? raw.year ?? new Date().getUTCFullYear();
  let parseInstant: InstantParser;
  try {
    parseInstant = compileTimestampFormat(raw.time_format, year);
  } catch (e) {
    throw new ProfilerConfigError(e instanceof Error ? e.message : String(e));
  }

  const events = raw.events.map((evt, idx): EventDefinition => ({
    name: evt.name,
    matchesStart: regexPredicate(compileRegex(evt.start_regex, `events[${idx}].start_regex`)),
    matchesEnd: regexPredicate(compileRegex(evt.end_regex, `events[${idx}].end_regex`)),
    warnThresholdMs: evt.threshold_ms
  }));

  return { headerPattern, parseInstant, events };
}

export async function loadProfilerConfig(configPath: string, overrides: ConfigOverrides = {}): Promise<ProfilerConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ProfilerConfigError(`Cannot read configuration ${configPath}: ${reason}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ProfilerConfigError(`Configuration ${configPath} is not valid JSON: ${reason}`);
  }
  return compileProfilerConfig(json, overrides);
}
