export {
  CurationWorkflow,
  type CurationWorkflowDeps,
  type GenerateOptions,
  type ReviewView,
  type SearchOutcome,
  type SearchResult,
  type SkippedItem,
} from "./workflow.js";
