import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Converter } from "./converter";
import { Logger } from "./utils";
import type { ConversionConfig } from "./types";

describe("Converter", () => {
  let root: string;
  let input: string;
  let output: string;
  let converter: Converter;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "langconv-"));
    input = join(root, "input");
    output = join(root, "output");
    await mkdir(input);

    const config: ConversionConfig = {
      input: { directory: input },
      output: { directory: output, indent: 2 },
      logging: { level: "error" },
    };
    converter = new Converter(config, { logger: new Logger("error") });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("converts .lang to pretty JSON", async () => {
    await writeFile(
      join(input, "en_us.lang"),
      "# Menu\nmenu.play=Play\n\nmenu.quit = Quit Game\nbroken line\n",
    );

    const stats = await converter.run("lang-to-json");

    expect(stats.convertedFiles).toBe(1);
    expect(await readFile(join(output, "en_us.json"), "utf-8")).toBe(
      '{\n  "menu.play": "Play",\n  "menu.quit": "Quit Game"\n}\n',
    );
  });

  it("converts JSON to .lang, skipping non-string members", async () => {
    await writeFile(
      join(input, "fr_fr.json"),
      '{"menu.play": "Jouer", "version": 3, "menu.quit": "Quitter"}',
    );

    const stats = await converter.run("json-to-lang");

    expect(stats.convertedFiles).toBe(1);
    expect(await readFile(join(output, "fr_fr.lang"), "utf-8")).toBe(
      "menu.play=Jouer\nmenu.quit=Quitter\n",
    );
  });

  it("continues past a malformed JSON file in both mode", async () => {
    await writeFile(join(input, "en_us.lang"), "a=1\n");
    await writeFile(join(input, "broken.json"), "{a: }");

    const stats = await converter.run("both");

    expect(stats.totalFiles).toBe(2);
    expect(stats.convertedFiles).toBe(1);
    expect(await readdir(output)).toEqual(["en_us.json"]);
    expect(stats.writeFailures).toEqual([]);
    expect(stats.readFailures).toHaveLength(1);
    expect(stats.readFailures[0]).toMatchObject({
      stem: "broken",
      path: join(input, "broken.json"),
      reason: "json-syntax-error",
    });
  });

  it("neither reads nor reports files outside the mode", async () => {
    await writeFile(join(input, "en_us.lang"), "a=1\n");
    await writeFile(join(input, "broken.json"), "{a: }");
    await writeFile(join(input, "readme.txt"), "not a locale");

    const stats = await converter.run("lang-to-json");

    expect(stats.totalFiles).toBe(1);
    expect(stats.readFailures).toEqual([]);
    expect(stats.writeFailures).toEqual([]);
    expect(await readdir(output)).toEqual(["en_us.json"]);
  });

  it("writes an empty object for a .lang file without entries", async () => {
    await writeFile(join(input, "empty.lang"), "# nothing here\n\n");

    await converter.run("lang-to-json");

    expect(await readFile(join(output, "empty.json"), "utf-8")).toBe("{}\n");
  });

  it("writes an empty .lang file for a top-level JSON array", async () => {
    await writeFile(join(input, "list.json"), '["a", "b"]');

    const stats = await converter.run("json-to-lang");

    expect(stats.readFailures).toEqual([]);
    expect(await readFile(join(output, "list.lang"), "utf-8")).toBe("");
  });

  it("starts every run with empty failure logs", async () => {
    await writeFile(join(input, "broken.json"), "{a: }");

    const first = await converter.run("json-to-lang");
    await rm(join(input, "broken.json"));
    const second = await converter.run("json-to-lang");

    expect(first.readFailures).toHaveLength(1);
    expect(second.readFailures).toEqual([]);
    expect(second.totalFiles).toBe(0);
  });

  it("round-trips lang → json → lang", async () => {
    const lang = "b.title=Second\na.title=First\n10=Ten\n";
    await writeFile(join(input, "pack.lang"), lang);

    await converter.run("lang-to-json");

    const jsonText = await readFile(join(output, "pack.json"), "utf-8");
    await rm(join(input, "pack.lang"));
    await writeFile(join(input, "pack.json"), jsonText);

    await converter.run("json-to-lang");

    expect(await readFile(join(output, "pack.lang"), "utf-8")).toBe(lang);
  });
});
