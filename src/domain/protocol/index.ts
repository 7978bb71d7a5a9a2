export type {
  RestStep,
  ConstantCurrentStep,
  ConstantVoltageStep,
  ImpedanceSweepStep,
  LoopStep,
  TagStep,
  ExecutableStep,
  Step,
  StepKind,
  ResolvedLoopStep,
  ResolvedStep,
  SampleParams,
  RecordParams,
  SafetyParams,
  Protocol,
} from './steps.js';
export { isLoopStep, isTagStep, isExecutableStep } from './steps.js';

export type { ProtocolError, ProtocolErrorTag, StructuralError, SchemaIssue, LoopInterval } from './error.js';
export { Err, isStructuralError } from './error.js';

export { ProtocolSchema, StepSchema, type ProtocolInput } from './schemas.js';
export { parseCRate } from './c-rate.js';
export { validateStructure } from './structure.js';
export {
  parseProtocol,
  createProtocol,
  serializeProtocol,
  withOverrides,
  type ProtocolOverrides,
} from './protocol.js';
