export { Environment, Closure, DEFAULT_MAX_DEPTH, TOP_LEVEL_LABEL, type EnvironmentOptions } from './env.js';
export { evaluate, evaluateSequence, isNil } from './eval.js';
export {
  LispFunction,
  callFunction,
  validateParams,
  type NativeFn,
} from './function.js';
export { BUILTINS, registerBuiltins } from './builtins.js';
export {
  createEnvironment,
  read,
  evalSource,
  evalProgram,
  evalFile,
  evalStream,
} from './engine.js';
export {
  EvalError,
  ArgsMismatchError,
  VoidVariableError,
  VoidFunctionError,
  ReadError,
  FileReadError,
  DepthLimitError,
} from './error.js';
