import { mkdtemp, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { DEFAULT_SETTINGS } from "../src/config/defaults";
import { type ContextOptions, createRunContext } from "../src/core/context";
import { seal } from "../src/core/integrity/sealer";
import type { KeepsakeSettings, RunContext } from "../src/types";

export function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `keepsake-${label}-`));
}

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * A run context rooted in `root`: destination `<root>/backups`, lock `<root>/keepsake.lock`.
 */
export function testContext(
  root: string,
  settings: Partial<KeepsakeSettings> = {},
  options: ContextOptions = {},
): RunContext {
  return createRunContext(
    {
      ...DEFAULT_SETTINGS,
      destination_dir: path.join(root, "backups"),
      lock_path: path.join(root, "keepsake.lock"),
      log_file: "",
      min_free_mb: 0,
      ...settings,
    },
    options,
  );
}

/**
 * Write a placeholder archive file and, unless `sealed` is false, its sha256 record.
 */
export async function writeArchiveFile(dir: string, name: string, sealed: boolean = true): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, `contents of ${name}`);
  if (sealed) {
    await seal(filePath, "sha256");
  }
  return filePath;
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

/**
 * Every console line written through a spy, colours removed.
 */
export function spiedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => stripAnsi(call.map(String).join(" ")));
}
