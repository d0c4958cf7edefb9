import { IANAZone } from 'luxon';
import { z } from 'zod';

// ==============================================
// Scheduler settings
// ==============================================

// Local time-of-day range, whole hours, [startHour, endHour)
export interface BlackoutWindow {
  startHour: number;
  endHour: number;
}

// Order of the ±N day search once the anchor day is full
export type FallbackOrder = 'interleaved' | 'backward-first';

export interface SchedulerConfig {
  timeZone: string;
  workdayStartHour: number;
  workdayEndHour: number;
  blackoutWindows: BlackoutWindow[];
  fallbackOrder: FallbackOrder;
  searchRadiusDays: number;
  slotStepMinutes: number;
  defaultSessionHours: number;
  defaultPrepSessions: number;
  defaultPrepSpanDays: number;
}

export interface GoogleConfig {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  refreshToken?: string;
  calendarId: string;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  scheduler: SchedulerConfig;
  google: GoogleConfig;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  timeZone: 'America/New_York',
  workdayStartHour: 9,
  workdayEndHour: 22,
  blackoutWindows: [
    { startHour: 12, endHour: 13 },
    { startHour: 18, endHour: 19 }
  ],
  fallbackOrder: 'interleaved',
  searchRadiusDays: 7,
  slotStepMinutes: 30,
  defaultSessionHours: 2,
  defaultPrepSessions: 3,
  defaultPrepSpanDays: 7
};

/**
 * "12-13,18-19" -> [{12,13},{18,19}]. An empty string means no blackout windows.
 */
export function parseBlackoutWindows(raw: string): BlackoutWindow[] {
  const trimmed = raw.trim();
  if (!trimmed) return [];

  return trimmed.split(',').map(part => {
    const match = /^\s*(\d{1,2})\s*-\s*(\d{1,2})\s*$/.exec(part);
    if (!match) {
      throw new Error(`Invalid blackout window "${part.trim()}", expected HH-HH`);
    }
    const startHour = Number(match[1]);
    const endHour = Number(match[2]);
    if (startHour >= endHour || endHour > 24) {
      throw new Error(`Invalid blackout window "${part.trim()}", hours out of range`);
    }
    return { startHour, endHour };
  });
}

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    FRONTEND_URL: z.string().default('http://localhost:5173'),
    SCHEDULER_TIMEZONE: z
      .string()
      .default(DEFAULT_SCHEDULER_CONFIG.timeZone)
      .refine(zone => IANAZone.isValidZone(zone), { message: 'Unknown IANA timezone' }),
    WORKDAY_START_HOUR: z.coerce.number().int().min(0).max(23).default(DEFAULT_SCHEDULER_CONFIG.workdayStartHour),
    WORKDAY_END_HOUR: z.coerce.number().int().min(1).max(24).default(DEFAULT_SCHEDULER_CONFIG.workdayEndHour),
    BLACKOUT_WINDOWS: z.string().default('12-13,18-19'),
    FALLBACK_ORDER: z.enum(['interleaved', 'backward-first']).default(DEFAULT_SCHEDULER_CONFIG.fallbackOrder),
    GOOGLE_CLIENT_ID: optionalString,
    GOOGLE_CLIENT_SECRET: optionalString,
    GOOGLE_REDIRECT_URI: optionalString,
    GOOGLE_REFRESH_TOKEN: optionalString,
    GOOGLE_CALENDAR_ID: z.string().default('primary')
  })
  .refine(env => env.WORKDAY_START_HOUR < env.WORKDAY_END_HOUR, {
    message: 'WORKDAY_START_HOUR must be before WORKDAY_END_HOUR',
    path: ['WORKDAY_START_HOUR']
  });

/**
 * Reads and validates the environment. Throws on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    frontendUrl: values.FRONTEND_URL,
    scheduler: {
      ...DEFAULT_SCHEDULER_CONFIG,
      timeZone: values.SCHEDULER_TIMEZONE,
      workdayStartHour: values.WORKDAY_START_HOUR,
      workdayEndHour: values.WORKDAY_END_HOUR,
      blackoutWindows: parseBlackoutWindows(values.BLACKOUT_WINDOWS),
      fallbackOrder: values.FALLBACK_ORDER
    },
    google: {
      clientId: values.GOOGLE_CLIENT_ID,
      clientSecret: values.GOOGLE_CLIENT_SECRET,
      redirectUri: values.GOOGLE_REDIRECT_URI,
      refreshToken: values.GOOGLE_REFRESH_TOKEN,
      calendarId: values.GOOGLE_CALENDAR_ID
    }
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
