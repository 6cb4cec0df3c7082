export {
  GridError,
  UnknownParticipantError,
  UnknownNodeError,
  NodeIdCollisionError,
  InvalidEnvelopeError,
  RunNotStartedError,
  RunAlreadyStartedError,
  InvalidArgumentError,
  SubmitError,
  CorruptEnvelopeError,
  MissingKeyError,
  KeyParameterError,
  InvalidConfigError,
  isKeyMaterialError,
  describeError,
} from './grid-error.js';
export type { GridErrorCode } from './grid-error.js';
