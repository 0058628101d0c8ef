export { step, fetchInstruction, resolveBranchTarget } from "./step";
export { effectiveAddress, loadLE, storeLE } from "./address";
export { compareFlags, conditionHolds, type Condition } from "./flags";
export {
  readValue,
  resolveRegister,
  resolveAddressRegister,
  widthOf,
} from "./operands";
