#!/usr/bin/env node
import { loadConfig, loadDotenvFiles, type RunnerConfig } from "./config.js";
import { ConfigError, describeJobError, errorMessage } from "./errors.js";
import { IMAGE_EXTENSIONS, VIDEO_EXTENSIONS, listGallery } from "./gallery.js";
import { Logger } from "./logger.js";
import {
  createImageGenerator,
  createVideoJobDeps,
  loadInputImage,
  resolveInputImagePath,
  type RunnerOverrides,
} from "./runner.js";
import { TrackerRegistry } from "./video/trackerRegistry.js";
import { VideoJobTracker, type VideoJobSnapshot } from "./video/videoJobTracker.js";

const USAGE = `Usage:
  media-job-runner video [imagePath]
  media-job-runner image <prompt> [--aspect-ratio <ratio>]
  media-job-runner gallery [videos|images]`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function statusLine(s: VideoJobSnapshot): string {
  switch (s.status) {
    case "submitted":
      return "Submitting generation request…";
    case "processing":
      return s.cancelled
        ? `Generation ${s.generationId} cancelled after ${s.pollCount} checks`
        : `Generation ${s.generationId} processing (checks: ${s.pollCount})`;
    case "succeeded":
      return `Generation complete: ${s.artifactPath}`;
    case "failed":
      return `Generation failed: ${s.error ? describeJobError(s.error) : "unknown error"}`;
  }
}

function takeOption(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx < 0) return undefined;
  const value = args[idx + 1];
  args.splice(idx, 2);
  return value;
}

function printGallery(io: CliIo, title: string, files: string[]): void {
  io.out(`${title} (${files.length})`);
  for (const file of files) io.out(`  ${file}`);
}

async function runVideo(
  config: RunnerConfig,
  log: Logger,
  args: string[],
  io: CliIo,
  overrides: RunnerOverrides,
  registry: TrackerRegistry,
  signal: AbortSignal,
): Promise<number> {
  const inputPath = await resolveInputImagePath(config, args[0]);
  io.out(`Generating video from ${inputPath}`);
  const image = await loadInputImage(inputPath);

  let lastLine = "";
  const tracker = await VideoJobTracker.submit(image, createVideoJobDeps(config, log, overrides), {
    params: { motionBucketId: config.motionBucketId },
    signal,
    onChange: (snapshot) => {
      const line = statusLine(snapshot);
      if (line !== lastLine) io.out(line);
      lastLine = line;
    },
  });
  registry.add(tracker);

  const final = await tracker.whenSettled();
  io.out(`Preview: ${final.displayPath}`);
  printGallery(io, "Generation History", await listGallery(config.videoOutputDir, VIDEO_EXTENSIONS));
  return final.status === "succeeded" ? 0 : 1;
}

async function runImage(
  config: RunnerConfig,
  log: Logger,
  args: string[],
  io: CliIo,
  overrides: RunnerOverrides,
): Promise<number> {
  const aspectRatio = takeOption(args, "--aspect-ratio");
  const prompt = args.join(" ");
  const generator = createImageGenerator(config, log, overrides);
  const result = await generator.generate({ prompt, aspectRatio });
  if (!result.imagePath) {
    io.err(`Image generation failed: ${result.errorName ?? "error"} ${result.errorMessages.join("; ")}`.trim());
    return 1;
  }
  io.out(`Saved image: ${result.imagePath}`);
  if (result.seed) io.out(`Seed: ${result.seed}`);
  return 0;
}

/**
 * Runs one command and returns the process exit code.
 */
export async function main(
  argv: string[],
  opts: { env?: NodeJS.ProcessEnv; io?: CliIo; overrides?: RunnerOverrides; cwd?: string } = {},
): Promise<number> {
  const io = opts.io ?? consoleIo;
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h") {
    io.out(USAGE);
    return command ? 0 : 1;
  }

  let config: RunnerConfig;
  try {
    config = loadConfig(opts.env ?? process.env, { requireApiKey: command !== "gallery", cwd: opts.cwd });
  } catch (e) {
    if (e instanceof ConfigError) {
      io.err(`❌ ${e.message}`);
      return 1;
    }
    throw e;
  }
  const log = new Logger(config.logLevel, { component: "media-job-runner" });
  const registry = new TrackerRegistry();
  const interrupted = new AbortController();
  const onSigint = () => {
    interrupted.abort();
    registry.cancelAll();
  };
  process.once("SIGINT", onSigint);

  try {
    switch (command) {
      case "video":
        return await runVideo(config, log, rest, io, opts.overrides ?? {}, registry, interrupted.signal);
      case "image":
        return await runImage(config, log, rest, io, opts.overrides ?? {});
      case "gallery": {
        const images = rest[0] === "images";
        const dir = images ? config.imageOutputDir : config.videoOutputDir;
        printGallery(io, images ? "Images" : "Videos", await listGallery(dir, images ? IMAGE_EXTENSIONS : VIDEO_EXTENSIONS));
        return 0;
      }
      default:
        io.err(`Unknown command "${command}"\n${USAGE}`);
        return 1;
    }
  } catch (e) {
    io.err(`❌ ${errorMessage(e)}`);
    return 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

if (require.main === module) {
  loadDotenvFiles();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error(`[media-job-runner] fatal: ${errorMessage(e)}`);
      process.exit(1);
    });
}
