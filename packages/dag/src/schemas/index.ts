/**
 * Engine input schemas
 */

export {
  NeedsEntrySchema,
  NeedsDeclarationSchema,
  StepDescriptorSchema,
  JobRecordSchema,
  JobMapSchema,
  type NeedsEntry,
  type NeedsDeclaration,
  type StepDescriptor,
  type JobRecordInput,
  type JobRecord,
  type JobMapInput,
  type JobMap,
  type DependencyMap,
  type AnalyzedJob,
} from "./job.schema.js";
