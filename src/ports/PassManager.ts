import type { ProgramReference } from "../core/primitives/primitive.types";
import type { Backend } from "../core/backend/backend.types";

/**
 * Rewrites programs into the target's native form. This client never checks
 * native-ness itself; it only validates the size and shape of what comes back.
 */
export interface PassManager {
  run(program: ProgramReference, backend: Backend): ProgramReference | Promise<ProgramReference>;
}
