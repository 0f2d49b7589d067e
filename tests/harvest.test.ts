/**
 * Harvest provider tests: plain payloads and ZIP uploads.
 */
import { describe, test, expect } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { strToU8 } from "fflate";

import { DataFormatError, SourceUnavailableError } from "../src/core/exceptions.js";
import { HarvestProvider, isZip, unzipArchive } from "../src/providers/harvest/harvest.js";
import { buildZip, makeEnv, makeStep, makeTmpDir, sparqlJson } from "./fixtures.js";

function setup() {
  const dir = makeTmpDir();
  const env = makeEnv(dir);
  const provider = new HarvestProvider(env.storage, env.sources);
  return { dir, env, provider, ...makeStep() };
}

async function readText(env: ReturnType<typeof makeEnv>, key: string): Promise<string> {
  return new TextDecoder().decode(await env.storage.read(key));
}

describe("HarvestProvider", () => {
  test("stores a SPARQL harvest under the version prefix", async () => {
    const { env, provider, step } = setup();
    const config = { source: "sparql", apiUrl: "http://sparql.test/query" };

    const outcome = await provider.execute(config, step);

    expect(outcome).toEqual({
      succeeded: true,
      message: `harvested ${Buffer.byteLength(sparqlJson())} bytes from sparql`,
      producedArtifacts: {
        harvest_dir: "animals/v1/harvest",
        harvest_path: "animals/v1/harvest/harvest.json",
      },
    });
    expect(await readText(env, "animals/v1/harvest/harvest.json")).toBe(sparqlJson());
    expect(env.sparql.calls).toEqual([config]);
  });

  test("stores an uploaded file under its own name", async () => {
    const { dir, env, provider, step } = setup();
    const path = join(dir, "animals.json");
    writeFileSync(path, sparqlJson());

    const outcome = await provider.execute({ source: "file", path }, step);

    expect(outcome.succeeded).toBe(true);
    expect(outcome.producedArtifacts.harvest_path).toBe("animals/v1/harvest/animals.json");
    expect(await readText(env, "animals/v1/harvest/animals.json")).toBe(sparqlJson());
  });

  test("unpacks a ZIP upload and picks the first JSON entry", async () => {
    const { dir, env, provider, step } = setup();
    const path = join(dir, "upload.zip");
    writeFileSync(
      path,
      buildZip({
        "readme.txt": "hello",
        "data/extra.json": "{}",
        "data/concepts.json": sparqlJson(),
      }),
    );

    const outcome = await provider.execute({ source: "file", path }, step);

    expect(outcome).toEqual({
      succeeded: true,
      message: "harvested 3 files from file archive",
      producedArtifacts: {
        harvest_dir: "animals/v1/harvest",
        harvest_path: "animals/v1/harvest/data/concepts.json",
        harvest_archive: "tmp/task-1/upload.zip",
      },
    });
    expect(await env.storage.list("animals/v1/harvest")).toEqual([
      "animals/v1/harvest/data/concepts.json",
      "animals/v1/harvest/data/extra.json",
      "animals/v1/harvest/readme.txt",
    ]);
    expect(await env.storage.exists("tmp/task-1/upload.zip")).toBe(true);
  });

  test("a configured entry picks the harvest file", async () => {
    const { dir, provider, step } = setup();
    const path = join(dir, "upload.zip");
    writeFileSync(path, buildZip({ "a.json": "{}", "b.json": sparqlJson() }));

    const outcome = await provider.execute({ source: "file", path, entry: "b.json" }, step);

    expect(outcome.producedArtifacts.harvest_path).toBe("animals/v1/harvest/b.json");
  });

  test("a missing entry fails the step", async () => {
    const { dir, provider, step } = setup();
    const path = join(dir, "upload.zip");
    writeFileSync(path, buildZip({ "a.json": "{}" }));

    const outcome = await provider.execute({ source: "file", path, entry: "nope.json" }, step);

    expect(outcome).toEqual({
      succeeded: false,
      message: "Malformed data: archive has no entry nope.json",
      producedArtifacts: {},
      error: "DataFormatError",
    });
  });

  test("an archive without JSON fails the step", async () => {
    const { dir, provider, step } = setup();
    const path = join(dir, "upload.zip");
    writeFileSync(path, buildZip({ "notes.txt": "nothing here" }));

    const outcome = await provider.execute({ source: "file", path }, step);

    expect(outcome.message).toBe("Malformed data: archive contains no .json file");
  });

  test("a missing upload is an unavailable source", async () => {
    const { dir, provider, step } = setup();
    const path = join(dir, "missing.json");

    const outcome = await provider.execute({ source: "file", path }, step);

    expect(outcome.succeeded).toBe(false);
    expect(outcome.error).toBe("SourceUnavailableError");
    expect(outcome.message.startsWith(`Source unavailable: ${path}: `)).toBe(true);
  });

  test("a source error fails the step", async () => {
    const { env, provider, step } = setup();
    env.sparql.error = new SourceUnavailableError("http://sparql.test/query responded 503");

    const outcome = await provider.execute(
      { source: "sparql", apiUrl: "http://sparql.test/query" },
      step,
    );

    expect(outcome).toEqual({
      succeeded: false,
      message: "Source unavailable: http://sparql.test/query responded 503",
      producedArtifacts: {},
      error: "SourceUnavailableError",
    });
  });

  test("invalid settings are a configuration failure", async () => {
    const { env, provider, step } = setup();

    const outcome = await provider.execute({ source: "sparql", apiUrl: "not a url" }, step);

    expect(outcome.error).toBe("ConfigurationError");
    expect(outcome.message).toBe("Invalid HARVEST configuration: apiUrl: Invalid url");
    expect(env.sparql.calls).toEqual([]);
  });
});

describe("isZip", () => {
  test("recognises the local file header", () => {
    expect(isZip(buildZip({ "a.json": "{}" }))).toBe(true);
    expect(isZip(strToU8("{}"))).toBe(false);
    expect(isZip(new Uint8Array([0x50, 0x4b]))).toBe(false);
  });
});

describe("unzipArchive", () => {
  test("rejects entries that escape the directory", () => {
    expect(() => unzipArchive(buildZip({ "../evil.json": "{}" }))).toThrow(
      "Malformed data: archive entry escapes harvest directory: ../evil.json",
    );
  });

  test("normalises entry paths", () => {
    const files = unzipArchive(buildZip({ "./data/../a.json": "{}" }));
    expect([...files.keys()]).toEqual(["a.json"]);
  });

  test("corrupt archives are DataFormatErrors", () => {
    const corrupt = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 1, 2, 3, 4]);
    expect(() => unzipArchive(corrupt)).toThrow(DataFormatError);
    expect(() => unzipArchive(corrupt)).toThrow(/^Malformed data: unreadable ZIP archive: /);
  });
});
