import { describe, it, expect, vi, beforeEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";

type FakeWatcher = { handlers: Record<string, () => void>; closed: boolean };

const watchers = vi.hoisted((): FakeWatcher[] => []);

vi.mock("chokidar", () => {
  const watch = () => {
    const w = {
      handlers: {} as Record<string, () => void>,
      closed: false,
      on(event: string, cb: () => void) { w.handlers[event] = cb; return w; },
      close() { w.closed = true; return Promise.resolve(); },
    };
    watchers.push(w);
    return w;
  };
  return { default: { watch }, watch };
});

import { watchConfig } from "../../config";
import type { AppConfig } from "../../config";
import { InvalidConfigurationError } from "../../errors";

async function waitFor(check: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !check(); i += 1) {
    await new Promise((r) => setTimeout(r, 5));
  }
}

describe("config.watchConfig", () => {
  beforeEach(() => { watchers.length = 0; });

  it("invokes onChange with the validated configuration when the file changes", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "midi-light-watch-"));
    const p = path.join(tmp, "cfg.yaml");
    await fs.writeFile(p, "midi:\n  channels: [1]\n", "utf8");
    const seen: AppConfig[] = [];
    const stop = watchConfig(p, (cfg) => { seen.push(cfg); });

    await fs.writeFile(p, "midi:\n  channels: [2, 3]\n", "utf8");
    watchers[0].handlers.change();
    await waitFor(() => seen.length > 0);

    expect(seen).toHaveLength(1);
    expect(seen[0].midi.channels).toEqual([2, 3]);
    await stop();
    expect(watchers[0].closed).toBe(true);
  });

  it("reports invalid content through onError", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "midi-light-watch-"));
    const p = path.join(tmp, "cfg.yaml");
    await fs.writeFile(p, "light:\n  transition_ms: -10\n", "utf8");
    const onChange = vi.fn();
    const errors: unknown[] = [];
    const stop = watchConfig(p, onChange, (err) => { errors.push(err); });

    watchers[0].handlers.change();
    await waitFor(() => errors.length > 0);

    expect(onChange).not.toHaveBeenCalled();
    expect(errors[0]).toBeInstanceOf(InvalidConfigurationError);
    await stop();
  });
});
