/**
 * @tinythis/processing
 *
 * Encode orchestration: presets, the ffmpeg invocation, output naming,
 * progress parsing, single jobs and the FIFO queue that runs them.
 *
 * Every encoder command line is logged at debug level.
 */

// Encoding presets
export {
  CRF_LEVELS,
  ENCODING_PRESETS,
  argumentsFor,
  parsePreset,
  nextPreset,
  prevPreset,
  toggleAccelerator,
  type EncodingPreset,
  type ArgumentProfile,
} from './presets.js';

// Command builder
export {
  FFmpegCommandBuilder,
  buildEncodeArgs,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Output naming
export {
  OUTPUT_TAG,
  OUTPUT_EXTENSION,
  MAX_COLLISION_SUFFIX,
  candidateOutputPath,
  resolveOutputPath,
  type ResolvedOutput,
} from './outputPath.js';

// Progress
export {
  MAX_RUNNING_FRACTION,
  FFmpegProgressParser,
  readProgressEvents,
  formatBytes,
  formatPercent,
  type ProgressStats,
  type ProgressEvent,
} from './progressParser.js';

// Jobs
export {
  DEFAULT_CANCEL_GRACE_MS,
  EncodeJob,
  spawnEncoder,
  type EncoderProcess,
  type ProcessLauncher,
  type FinishedState,
  type JobResult,
  type JobProgress,
  type JobSnapshot,
  type StartOptions,
} from './encodeJob.js';

// Queue
export {
  SUPPORTED_EXTENSIONS,
  ENCODER_HINT,
  isSupportedVideo,
  JobQueue,
  type JobQueueOptions,
  type QueueSummary,
} from './jobQueue.js';
