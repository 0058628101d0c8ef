export * from "./types/operand";
export * from "./types/instruction";
export * from "./types/program";
export { ParseError, IOError } from "./lib/errors";
export {
  classifyOperand,
  parseInteger,
  isRegisterName,
  toRegisterRef,
  splitTopLevel,
  MAX_GPR_INDEX,
} from "./lib/operand";
export { decodeLine, stripComment, isValidatedMnemonic } from "./lib/decoder";
export {
  buildProgram,
  parseProgram,
  loadProgram,
  endAddress,
  resolveLabel,
} from "./lib/program";
