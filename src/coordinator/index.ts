/**
 * Reference/test run coordination and reporting.
 */

export {
  RunCoordinator,
  type CoordinatorOptions,
  type ValidationOutcome,
} from "./coordinator.js";
export { LogReporter, type Reporter, type ReportImages } from "./reporter.js";
