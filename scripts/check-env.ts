#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for scriptreel.
 * Checks the project layout, actor profiles, provider credentials and the
 * ffmpeg/ffprobe binaries.
 * Run: npm run check-env -- [project]
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import { env, DEFAULT_PROJECT } from '../src/config.js';
import { ActorRegistry } from '../src/actors.js';
import { resolveProject } from '../src/project.js';
import { describe } from '../src/utils/errors.js';
import { telegramEnabled } from '../src/monitoring/telegram.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${detail})`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkPath(label: string, filePath: string, hint: string): boolean {
  if (existsSync(filePath)) {
    pass(label, filePath);
    return true;
  }
  fail(label, hint);
  anyRequiredFailed = true;
  return false;
}

function checkSecret(label: string, value: string | undefined, required: boolean, hint: string): void {
  if (value) {
    // Mask secrets: show first 4 chars + ellipsis
    pass(label, value.length > 10 ? `${value.slice(0, 4)}…` : '(set)');
  } else if (required) {
    fail(label, hint);
    anyRequiredFailed = true;
  } else {
    note(label, 'not set, not needed by these actors');
  }
}

function checkBinary(label: string, binary: string): void {
  try {
    const out = execFileSync(binary, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(label, out.split('\n')[0] ?? binary);
  } catch (err) {
    fail(label, `${binary} is not runnable: ${describe(err)}`);
    anyRequiredFailed = true;
  }
}

const project = resolveProject(process.argv[2] ?? DEFAULT_PROJECT);

console.log(`\n${BOLD}=== scriptreel — Pre-flight Check ===${RESET}\n`);

// ── Section: Project layout ───────────────────────────────────────────────────

console.log(`${BOLD}[ 1 ] Project ${project.name}${RESET}`);

checkPath('PROJECTS_DIR', env.PROJECTS_DIR, `Create: mkdir -p "${env.PROJECTS_DIR}"`);
checkPath('script.txt', project.script, `Write the script to ${project.script}`);

// ── Section: Actor profiles ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Actor profiles${RESET}`);

let actors: ActorRegistry | null = null;
if (checkPath('actor profile file', project.actors, 'Set ACTORS_FILE or add actors.json to the project')) {
  try {
    actors = ActorRegistry.load(project.actors);
    pass('actor profiles valid', actors.ids().join(', '));
  } catch (err) {
    fail('actor profiles invalid', describe(err));
    anyRequiredFailed = true;
  }
}

// ── Section: Provider credentials ─────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Provider credentials${RESET}`);

checkSecret('HEYGEN_API_KEY', env.HEYGEN_API_KEY, true, 'Get from https://app.heygen.com/settings');
checkSecret(
  'ELEVENLABS_API_KEY',
  env.ELEVENLABS_API_KEY,
  actors?.usesExternalSpeech() ?? true,
  'Get from https://elevenlabs.io/app/settings/api-keys',
);

// ── Section: Media tools ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Media tools${RESET}`);

checkBinary('ffmpeg', env.FFMPEG_PATH);
checkBinary('ffprobe', env.FFPROBE_PATH);
if (existsSync(env.FONT_FILE)) {
  pass('overlay font', env.FONT_FILE);
} else {
  note('overlay font', `${env.FONT_FILE} missing, chapter overlays will fail`);
}

// ── Section: Notifications ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Notifications${RESET}`);

if (telegramEnabled()) {
  pass('Telegram alerts', `chat ${env.TELEGRAM_CHAT_ID ?? ''}`);
} else {
  note('Telegram alerts', 'disabled, set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID to enable');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start -- render ${project.name}${RESET}\n`);
}
