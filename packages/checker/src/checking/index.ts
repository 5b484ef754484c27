/**
 * Checking - Public API
 */

export { checkProgram } from "./check.js";
export { CheckingSession } from "./session.js";
export { visitSourceFile } from "./visitor.js";
export {
  type ClosureLike,
  candidateFromSignature,
  describeCandidate,
  getNodeLocation,
} from "./helpers.js";
export type {
  CheckOptions,
  CheckedProgram,
  ExtensionFactory,
  LocalExtensionProvider,
} from "./types.js";
