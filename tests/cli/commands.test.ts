import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { listCommand } from "../../src/cli/commands/list";
import { runCommand } from "../../src/cli/commands/run";
import { startCommand } from "../../src/cli/commands/start";
import { main } from "../../src/cli/main";
import { VERSION } from "../../src/cli/ui";
import { SECONDS_PER_DAY } from "../../src/core/retention/evaluator";
import { setLogLevel } from "../../src/utils/logger";

const NOW = Date.parse("2024-06-01T00:00:00Z") / 1000;
const ENDPOINT = ["--endpoint", "http://qbit.test:8080", "--password", "test-secret"];

interface WebUIState {
  loginBody: string;
  deleteStatus: number;
  deleted: string[];
  torrents: unknown[];
}

// In-process stand-in for the qBittorrent WebUI
function installWebUI(state: WebUIState) {
  const fetchFn = vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);

    if (url.endsWith("/api/v2/auth/login")) {
      return new Response(state.loginBody, {
        status: 200,
        headers: { "set-cookie": "SID=test-session; path=/" },
      });
    }
    if (url.endsWith("/api/v2/torrents/info")) {
      return new Response(JSON.stringify(state.torrents), {
        headers: { "content-type": "application/json" },
      });
    }
    if (url.endsWith("/api/v2/torrents/delete")) {
      if (state.deleteStatus === 200) {
        state.deleted.push(new URLSearchParams(String(init?.body)).get("hashes") ?? "");
      }
      return new Response("", { status: state.deleteStatus });
    }
    return new Response("Not Found", { status: 404 });
  });

  vi.stubGlobal("fetch", fetchFn);
  return fetchFn;
}

describe("CLI commands", () => {
  let state: WebUIState;
  let fetchFn: ReturnType<typeof installWebUI>;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let stdout: string[];

  function printed(): string {
    return [
      ...logSpy.mock.calls.map((call) => String(call[0])),
      ...errorSpy.mock.calls.map((call) => String(call[0])),
      ...stdout,
    ].join("\n");
  }

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW * 1000);
    vi.stubEnv("QBIT_ENDPOINT", "");
    vi.stubEnv("QBIT_USERNAME", "");
    vi.stubEnv("QBIT_PASSWORD", "");
    setLogLevel("info");

    state = {
      loginBody: "Ok.",
      deleteStatus: 200,
      deleted: [],
      torrents: [
        { hash: "aaa", name: "stale", added_on: NOW - 365 * SECONDS_PER_DAY, ratio: 1 },
        { hash: "bbb", name: "popular", added_on: NOW - 365 * SECONDS_PER_DAY, ratio: 30 },
        { hash: "ccc", name: "young", added_on: NOW - 10 * SECONDS_PER_DAY, ratio: 0 },
      ],
    };
    fetchFn = installWebUI(state);

    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    stdout = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe("main", () => {
    test("shows help without a command", async () => {
      expect(await main([])).toBe(0);
      expect(printed()).toContain("Commands");
    });

    test("shows help for --help", async () => {
      expect(await main(["--help"])).toBe(0);
      expect(printed()).toContain("seedsweep <command> --help");
    });

    test("prints the version", async () => {
      expect(await main(["--version"])).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(VERSION);
    });

    test("rejects an unknown command", async () => {
      expect(await main(["purge"])).toBe(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain("Unknown command: purge");
      expect(fetchFn).not.toHaveBeenCalled();
    });

    test("dispatches to a command", async () => {
      expect(await main(["run", ...ENDPOINT])).toBe(0);
      expect(state.deleted).toEqual(["aaa"]);
    });
  });

  describe("run", () => {
    test("shows command help", async () => {
      expect(await runCommand(["--help"])).toBe(0);
      expect(String(logSpy.mock.calls[0]?.[0])).toContain("seedsweep run");
      expect(fetchFn).not.toHaveBeenCalled();
    });

    test("removes torrents below the target and exits 0", async () => {
      expect(await runCommand(ENDPOINT)).toBe(0);

      expect(state.deleted).toEqual(["aaa"]);
      expect(printed()).toContain(
        "Removing torrent with files: stale (hash=aaa), predicted_ratio=1.00, age_days=365, current_ratio=1.00",
      );
    });

    test("removes nothing in dry-run mode", async () => {
      expect(await runCommand([...ENDPOINT, "--dry-run"])).toBe(0);

      expect(state.deleted).toEqual([]);
      expect(printed()).toContain("Dry run - would remove torrent: stale (hash=aaa)");
      expect(printed()).toContain("[DRY RUN] No torrents were removed.");
    });

    test("applies --age and --ratio", async () => {
      expect(await runCommand([...ENDPOINT, "--age", "400", "--ratio", "0.5"])).toBe(0);
      expect(state.deleted).toEqual([]);
    });

    test("exits 1 on a malformed endpoint before any request", async () => {
      expect(await runCommand(["--endpoint", "not-a-url"])).toBe(1);

      expect(fetchFn).not.toHaveBeenCalled();
      expect(printed()).toContain('Run failed: client.endpoint is not a valid URL: "not-a-url"');
    });

    test("exits 1 on a non-numeric --age", async () => {
      expect(await runCommand([...ENDPOINT, "--age", "abc"])).toBe(1);

      expect(fetchFn).not.toHaveBeenCalled();
      expect(printed()).toContain('Run failed: --age must be a non-negative integer, got "abc"');
    });

    test("exits 1 when login fails", async () => {
      state.loginBody = "Fails.";

      expect(await runCommand(ENDPOINT)).toBe(1);

      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(printed()).toContain("Run failed: Login failed: invalid username or password");
    });

    test("exits 1 when a removal fails", async () => {
      state.deleteStatus = 500;

      expect(await runCommand(ENDPOINT)).toBe(1);

      expect(printed()).toContain(
        "Run failed: Failed to remove torrent aaa: delete request failed with HTTP 500",
      );
    });
  });

  describe("list", () => {
    test("prints filtered decisions as JSON and never removes", async () => {
      expect(await listCommand([...ENDPOINT, "--format", "json", "--action", "remove"])).toBe(0);

      expect(state.deleted).toEqual([]);
      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual([
        {
          hash: "aaa",
          name: "stale",
          action: "remove",
          ageDays: 365,
          ratio: 1,
          projectedRatio: 1,
          rationale: "projected ratio 1.00 is below 10",
        },
      ]);
    });

    test("prints every decision when unfiltered", async () => {
      expect(await listCommand([...ENDPOINT, "--format", "json"])).toBe(0);

      const rows: { hash: string; action: string }[] = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(rows.map((row) => [row.hash, row.action])).toEqual([
        ["aaa", "remove"],
        ["bbb", "keep"],
        ["ccc", "too_young"],
      ]);
    });

    test("rejects an unknown action", async () => {
      expect(await listCommand([...ENDPOINT, "--action", "purge"])).toBe(1);

      expect(fetchFn).not.toHaveBeenCalled();
      expect(printed()).toContain("Unknown action: purge");
    });
  });

  describe("start", () => {
    test("exits 1 without a schedule", async () => {
      expect(await startCommand(ENDPOINT)).toBe(1);

      expect(fetchFn).not.toHaveBeenCalled();
      expect(printed()).toContain("No schedule configured");
    });

    test("exits 1 on an invalid cron expression", async () => {
      expect(await startCommand([...ENDPOINT, "--cron", "daily"])).toBe(1);

      expect(printed()).toContain(
        'Failed to start: Invalid cron expression: "daily". Expected 5 fields, got 1.',
      );
    });
  });
});
