import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { listFiles, normalizeExtension, pickRandom, selectFile } from "./index";
import { isCodetypeError } from "../errors";

let root: string;

function write(relPath: string, content = "line\n") {
  const abs = path.join(root, relPath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
}

function rel(files: string[]): string[] {
  return files.map((f) => path.relative(root, f).split(path.sep).join("/"));
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "codetype-selector-"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("listFiles", () => {
  test("walks recursively and skips files without an extension", async () => {
    write("a.ts");
    write("src/b.rs");
    write("src/deep/c.py");
    write("Makefile");

    expect(rel(await listFiles(root))).toEqual(["a.ts", "src/b.rs", "src/deep/c.py"]);
  });

  test("filters by extension case-insensitively", async () => {
    write("a.ts");
    write("b.TS");
    write("c.js");

    expect(rel(await listFiles(root, { extension: "ts" }))).toEqual(["a.ts", "b.TS"]);
    expect(rel(await listFiles(root, { extension: ".TS" }))).toEqual(["a.ts", "b.TS"]);
  });

  test("honours .gitignore patterns, negations and directory excludes", async () => {
    write(".gitignore", "*.log\n!keep.log\nbuild/\n/top.txt\n");
    write("app.log");
    write("keep.log");
    write("build/out.js");
    write("top.txt");
    write("nested/top.txt");
    write("main.ts");

    expect(rel(await listFiles(root))).toEqual(["keep.log", "main.ts", "nested/top.txt"]);
  });

  test("applies nested ignore files relative to their directory", async () => {
    write(".gitignore", "*.gen.ts\n");
    write("pkg/.gitignore", "fixtures/\n!special.gen.ts\n");
    write("pkg/fixtures/data.json");
    write("pkg/special.gen.ts");
    write("pkg/index.ts");
    write("other.gen.ts");
    write("fixtures/kept.json");

    expect(rel(await listFiles(root))).toEqual([
      "fixtures/kept.json",
      "pkg/index.ts",
      "pkg/special.gen.ts",
    ]);
  });

  test("reads .ignore files as well", async () => {
    write(".ignore", "vendor\n");
    write("vendor/lib.c");
    write("main.c");

    expect(rel(await listFiles(root))).toEqual(["main.c"]);
  });

  test("skips hidden entries unless asked and never enters .git", async () => {
    write(".config/settings.json");
    write(".git/HEAD.txt");
    write("visible.md");

    expect(rel(await listFiles(root))).toEqual(["visible.md"]);
    expect(rel(await listFiles(root, { hidden: true }))).toEqual([
      ".config/settings.json",
      "visible.md",
    ]);
  });

  test("every listed file is under the root and matches the filter", async () => {
    write(".gitignore", "ignored/\n");
    write("x/y/z.ts");
    write("x/y/z.js");
    write("ignored/w.ts");
    write("q.ts");

    const files = await listFiles(root, { extension: "ts" });
    expect(files.length).toBe(2);
    for (const file of files) {
      expect(path.relative(root, file).startsWith("..")).toBe(false);
      expect(path.extname(file)).toBe(".ts");
      expect(file.includes(`${path.sep}ignored${path.sep}`)).toBe(false);
    }
  });

  test("missing directory fails with PathNotFound", async () => {
    const missing = path.join(root, "nope");
    await expect(listFiles(missing)).rejects.toMatchObject({ kind: "PathNotFound" });
  });

  test("a file given as directory fails with NotReadable", async () => {
    write("file.ts");
    await expect(listFiles(path.join(root, "file.ts"))).rejects.toMatchObject({
      kind: "NotReadable",
    });
  });
});

describe("normalizeExtension", () => {
  test("drops leading dots and lowercases", () => {
    expect(normalizeExtension(".Rs")).toBe("rs");
    expect(normalizeExtension("tsx")).toBe("tsx");
  });
});

describe("pickRandom", () => {
  test("maps the random source onto an index", () => {
    const items = ["a", "b", "c", "d"];
    expect(pickRandom(items, () => 0)).toBe("a");
    expect(pickRandom(items, () => 0.5)).toBe("c");
    expect(pickRandom(items, () => 0.999)).toBe("d");
  });

  test("returns undefined for no items", () => {
    expect(pickRandom([], () => 0.3)).toBeUndefined();
  });
});

describe("selectFile", () => {
  test("returns the explicit file without filtering", async () => {
    write(".gitignore", "*.txt\n");
    write("notes.txt");
    const file = path.join(root, "notes.txt");

    await expect(
      selectFile({ dir: root, file, extension: "rs", random: () => 0 })
    ).resolves.toBe(file);
  });

  test("explicit file that does not exist fails with PathNotFound", async () => {
    await expect(
      selectFile({ dir: root, file: path.join(root, "missing.ts"), random: () => 0 })
    ).rejects.toMatchObject({ kind: "PathNotFound" });
  });

  test("explicit directory fails with NotReadable", async () => {
    fs.mkdirSync(path.join(root, "sub"));
    await expect(
      selectFile({ dir: root, file: path.join(root, "sub"), random: () => 0 })
    ).rejects.toMatchObject({ kind: "NotReadable" });
  });

  test("picks among candidates with the injected random source", async () => {
    write("a.ts");
    write("b.ts");
    write("c.ts");

    const picked = await selectFile({ dir: root, random: () => 0.4 });
    expect(rel([picked])).toEqual(["b.ts"]);
  });

  test("empty directory fails with NoMatchingFiles", async () => {
    try {
      await selectFile({ dir: root, random: () => 0 });
      expect.unreachable();
    } catch (error) {
      expect(isCodetypeError(error, "NoMatchingFiles")).toBe(true);
    }
  });

  test("no file with the extension fails with NoMatchingFiles", async () => {
    write("a.ts");
    await expect(
      selectFile({ dir: root, extension: ".go", random: () => 0 })
    ).rejects.toMatchObject({
      kind: "NoMatchingFiles",
      message: `no files with extension .go found in ${root}`,
    });
  });
});
