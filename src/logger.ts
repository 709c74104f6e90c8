/**
 * Run logger for the planner.
 *
 * All output goes to stderr so stdout stays free for the host application.
 * Nothing is written until a verbosity above `disable` is selected.
 */

export type Verbosity = "disable" | "minimal" | "simple" | "standard" | "verbose";

const RANK: Record<Verbosity, number> = {
  disable: 0,
  minimal: 1,
  simple: 2,
  standard: 3,
  verbose: 4,
};

let current: Verbosity = "disable";

// ── Core write ───────────────────────────────────────────────────────────────

function write(threshold: Verbosity, message: string): void {
  if (RANK[current] < RANK[threshold]) return;
  process.stderr.write(message + "\n");
}

// ── Public API ───────────────────────────────────────────────────────────────

export function setVerbosity(verbosity: Verbosity): void {
  current = verbosity;
}

export function getVerbosity(): Verbosity {
  return current;
}

export function section(title: string): void {
  write("standard", `\n${"─".repeat(50)}`);
  write("standard", `▶  ${title}`);
  write("standard", "─".repeat(50));
}

export function info(message: string): void {
  write("simple", `ℹ️  ${message}`);
}

export function detail(message: string): void {
  write("verbose", `   ${message}`);
}

export function warn(message: string): void {
  write("minimal", `⚠️  ${message}`);
}

export function error(message: string): void {
  write("minimal", `💥 ${message}`);
}

export function planned(level: number, partial: number, length: number, actions: number): void {
  write("simple", `🧠 Level ${level} partial ${partial}: ${length} steps, ${actions} actions`);
}

export function divided(level: number, first: number, last: number, partials: number): void {
  write("standard", `✂️  Level ${level} stages ${first}..${last} → ${partials} partial problem(s)`);
}

export function yielded(increment: number, fromStep: number, toStep: number, final: boolean): void {
  write("simple", `📤 Yield ${increment}: steps ${fromStep + 1}..${toStep}${final ? " (final)" : ""}`);
}
