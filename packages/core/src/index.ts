/**
 * @tinythis/core
 * 
 * Core package containing:
 * - Job state machine
 * - Error taxonomy
 * - Shared types
 * - Encoder location
 */

// State machine
export {
  JobStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalState,
  type JobStateTransition,
} from './stateMachine.js';

// Types
export {
  PRESETS,
  DEFAULT_PRESET,
  ACCELERATOR_MODES,
  JOB_STATES,
  type Preset,
  type AcceleratorMode,
  type JobState,
  type EncodeSettings,
  type InputFile,
} from './types/job.js';

// Errors
export {
  TinythisError,
  ValidationError,
  ResourceUnavailableError,
  ExecutionError,
  CancellationError,
  FilesystemError,
  StateTransitionError,
  QueueError,
  toTinythisError,
} from './errors/index.js';

// Encoder location
export {
  getAppDataDir,
  getEncoderCandidates,
  locateEncoder,
  isEncoderRunnable,
  type EncoderLocation,
  type EncoderLocator,
  type EncoderSource,
  type LocateOptions,
} from './config/binaries.js';
