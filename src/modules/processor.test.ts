import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { process } from "./processor";
import { scan } from "./scanner";
import { Logger, Tracker } from "../utils";
import type { ConversionContext, ConversionMode } from "../types";

describe("process", () => {
  let root: string;
  let input: string;
  let output: string;
  let logger: Logger;

  function createContext(
    mode: ConversionMode,
    dryRun = false,
  ): ConversionContext {
    return {
      config: {
        input: { directory: input },
        output: { directory: output, indent: 2 },
        logging: { level: "error" },
      },
      mode,
      logger,
      dryRun,
      tracker: new Tracker(mode),
    };
  }

  async function run(mode: ConversionMode, dryRun = false) {
    const ctx = createContext(mode, dryRun);
    await scan(ctx);
    await process(ctx);
    return ctx.tracker.getStats();
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "langconv-process-"));
    input = join(root, "input");
    output = join(root, "output");
    await mkdir(input);
    logger = new Logger("error");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("requires the scanner to run first", async () => {
    await expect(process(createContext("both"))).rejects.toThrow(
      "Scanner must run before processor",
    );
  });

  it("emits one progress notice per written file", async () => {
    const info = vi.spyOn(logger, "info");
    await writeFile(join(input, "en.lang"), "a=1\n");

    await run("lang-to-json");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith(
      `${join(input, "en.lang")} => ${join(output, "en.json")}`,
    );
  });

  it("does not emit a notice for a file that failed to read", async () => {
    const info = vi.spyOn(logger, "info");
    await writeFile(join(input, "broken.json"), "{a: }");

    const stats = await run("json-to-lang");

    expect(info).not.toHaveBeenCalled();
    expect(stats.readFailures).toHaveLength(1);
  });

  it("records a write failure when the destination is a directory", async () => {
    const info = vi.spyOn(logger, "info");
    await writeFile(join(input, "en.lang"), "a=1\n");
    await mkdir(join(output, "en.json"), { recursive: true });

    const stats = await run("lang-to-json");

    expect(stats.readFailures).toEqual([]);
    expect(stats.writeFailures).toHaveLength(1);
    expect(stats.writeFailures[0].stem).toBe("en");
    expect(stats.writeFailures[0].reason).toBe("write-error");
    expect(stats.writeFailures[0].message).toMatch(
      /^Failed to write .*en\.json: /,
    );
    expect(stats.convertedFiles).toBe(0);
    expect(info).not.toHaveBeenCalled();
  });

  it("records invalid UTF-8 as a read failure", async () => {
    await writeFile(join(input, "binary.lang"), Buffer.from([0xff, 0xfe, 0xfd]));

    const stats = await run("lang-to-json");

    expect(stats.readFailures).toHaveLength(1);
    expect(stats.readFailures[0].reason).toBe("read-error");
    expect(stats.readFailures[0].message).toMatch(/^Failed to read .*binary\.lang: /);
  });

  it("ignores a UTF-8 byte order mark", async () => {
    await writeFile(join(input, "bom.json"), '\uFEFF{"k": "v"}');

    const stats = await run("json-to-lang");

    expect(stats.readFailures).toEqual([]);
    expect(await readFile(join(output, "bom.lang"), "utf-8")).toBe("k=v\n");
  });

  it("writes nothing in dry run mode", async () => {
    const info = vi.spyOn(logger, "info");
    await writeFile(join(input, "en.lang"), "a=1\n");

    const stats = await run("lang-to-json", true);

    expect(stats.convertedFiles).toBe(1);
    expect(info).toHaveBeenCalledWith(
      `${join(input, "en.lang")} => ${join(output, "en.json")} (dry run)`,
    );
    await expect(readdir(output)).rejects.toThrow();
  });

  it("uses the configured indent for JSON output", async () => {
    await writeFile(join(input, "en.lang"), "a=1\n");
    const ctx = createContext("lang-to-json");
    ctx.config.output.indent = 4;

    await scan(ctx);
    await process(ctx);

    expect(await readFile(join(output, "en.json"), "utf-8")).toBe(
      '{\n    "a": "1"\n}\n',
    );
  });
});
