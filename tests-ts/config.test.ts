import path from "path";
import { defaultRunConfig, parseArgsOrNull } from "../src-ts/config";
import { DiscoveryError } from "../src-ts/errors";
import { collectInteractiveConfig } from "../src-ts/interactive";

describe("defaultRunConfig", () => {
  it("points at the Downloads folder", () => {
    const downloads = path.join("/home/tester", "Downloads");
    expect(defaultRunConfig("/home/tester")).toEqual({
      directory: downloads,
      logFile: path.join(downloads, "invalid_data_log.txt"),
      outFile: path.join(downloads, "all_haarvi_serum.csv"),
    });
  });
});

describe("parseArgsOrNull", () => {
  const defaults = defaultRunConfig("/home/tester");

  it("uses the defaults without flags", () => {
    expect(parseArgsOrNull([], defaults)).toEqual({
      ...defaults,
      archive: undefined,
      interactive: false,
    });
  });

  it("puts log and output beside a custom folder", () => {
    const parsed = parseArgsOrNull(["--dir", "/data/batches"], defaults);
    expect(parsed?.directory).toBe("/data/batches");
    expect(parsed?.logFile).toBe(path.join("/data/batches", "invalid_data_log.txt"));
    expect(parsed?.outFile).toBe(path.join("/data/batches", "all_haarvi_serum.csv"));
  });

  it("lets explicit paths win", () => {
    const parsed = parseArgsOrNull(
      ["--dir", "/data", "--out", "/tmp/out.csv", "--archive", "/data/b.zip"],
      defaults
    );
    expect(parsed?.outFile).toBe("/tmp/out.csv");
    expect(parsed?.archive).toBe("/data/b.zip");
    expect(parsed?.logFile).toBe(path.join("/data", "invalid_data_log.txt"));
  });

  it("recognises interactive mode", () => {
    expect(parseArgsOrNull(["--interactive"], defaults)?.interactive).toBe(true);
  });

  it("returns null for help and malformed input", () => {
    expect(parseArgsOrNull(["--help"], defaults)).toBeNull();
    expect(parseArgsOrNull(["--bogus", "x"], defaults)).toBeNull();
    expect(parseArgsOrNull(["--log"], defaults)).toBeNull();
    expect(parseArgsOrNull(["--log", "--out", "x"], defaults)).toBeNull();
    expect(parseArgsOrNull(["stray"], defaults)).toBeNull();
  });
});

describe("collectInteractiveConfig", () => {
  it("raises a discovery error when the folder does not exist", async () => {
    const defaults = defaultRunConfig("/nonexistent/home");
    await expect(collectInteractiveConfig(defaults)).rejects.toThrow(DiscoveryError);
  });
});
