import { randomOutcomeSource, seededOutcomeSource } from "../core/outcomes.js";
import { AnnotationSession, type AnnotationSessionOptions } from "../core/session.js";

import type { PreparedExportWorkflow } from "./workflow-setup.js";

export function createWorkflowSession(
  workflow: PreparedExportWorkflow,
  overrides: AnnotationSessionOptions = {}
): AnnotationSession {
  return new AnnotationSession({
    outcomes: workflow.seed !== undefined ? seededOutcomeSource(workflow.seed) : randomOutcomeSource(),
    strict: workflow.strict,
    ...overrides
  });
}
