import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Providers (required only by the commands that call them)
  ELEVENLABS_API_KEY:            z.string().min(1).optional(),
  HEYGEN_API_KEY:                z.string().min(1).optional(),

  // Projects
  PROJECTS_DIR:                  z.string().default('./projects'),
  ACTORS_FILE:                   z.string().min(1).optional(),

  // Job polling
  POLL_INTERVAL_MS:              z.coerce.number().int().positive().default(10_000),
  POLL_MAX_ATTEMPTS:             z.coerce.number().int().positive().default(100),

  // Rendering
  VIDEO_WIDTH:                   z.coerce.number().int().positive().default(1280),
  VIDEO_HEIGHT:                  z.coerce.number().int().positive().default(720),
  FFMPEG_PATH:                   z.string().default('ffmpeg'),
  FFPROBE_PATH:                  z.string().default('ffprobe'),
  FONT_FILE:                     z.string().default('/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf'),

  // Notifications (both must be set to enable)
  TELEGRAM_BOT_TOKEN:            z.string().min(1).optional(),
  TELEGRAM_CHAT_ID:              z.string().min(1).optional(),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Polling ───────────────────────────────────────────────────────────────────

export const POLL_POLICY = {
  intervalMs:  env.POLL_INTERVAL_MS,
  maxAttempts: env.POLL_MAX_ATTEMPTS,
} as const;

// ── Output geometry ───────────────────────────────────────────────────────────

export const VIDEO_DIMENSION = {
  width:  env.VIDEO_WIDTH,
  height: env.VIDEO_HEIGHT,
} as const;

// ── Project layout ────────────────────────────────────────────────────────────

export const PROJECT_FILES = {
  script:     'script.txt',
  actors:     'actors.json',
  cacheDir:   'cache',
  finalMovie: 'final_movie.mp4',
} as const;

export const DEFAULT_PROJECT = 'test_project';
