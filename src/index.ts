export { loadConfig, loadDotenvFiles, type RunnerConfig } from "./config.js";
export * from "./errors.js";
export { listGallery, latestFile, IMAGE_EXTENSIONS, VIDEO_EXTENSIONS } from "./gallery.js";
export { fetchTransport, toHttpResult, type HttpRequest, type HttpResult, type HttpTransport } from "./http.js";
export { ImageGenerator, ASPECT_RATIOS, type ImageGenerationResult, type ImagePrompt } from "./image/imageGenerator.js";
export { Logger, createLogger, logger, type LogLevel } from "./logger.js";
export { createImageGenerator, createVideoJobDeps, loadInputImage, resolveInputImagePath } from "./runner.js";
export { StabilityClient, type InputImage, type VideoGenerationApi, type ImageGenerationApi } from "./stability/client.js";
export { displayPath, transition, initialState, isTerminal, type VideoJobState, type VideoJobStatus } from "./video/jobState.js";
export { ArtifactMaterializer, VIDEO_ARTIFACT, IMAGE_ARTIFACT, artifactFileName } from "./video/materializer.js";
export { runPollLoop, systemClock, type Clock } from "./video/pollScheduler.js";
export { interpretPollResponse, type PollOutcome } from "./video/statusInterpreter.js";
export { submitVideoJob, interpretSubmissionResponse, type VideoParams } from "./video/submission.js";
export { TrackerRegistry } from "./video/trackerRegistry.js";
export { VideoJobTracker, type VideoJobDeps, type VideoJobSnapshot } from "./video/videoJobTracker.js";
