/**
 * Job Schema
 *
 * Input contract for the normalized job map handed to the engine by the
 * configuration collaborator.
 */

import { z } from "zod";

/**
 * `__proto__` cannot be held as an own key of a plain object map, so a job
 * under that name would vanish instead of failing
 */
const JobNameSchema = z
  .string()
  .min(1, "job name must not be empty")
  .refine((name) => name !== "__proto__", "job name '__proto__' is reserved");

/**
 * One element of a list-form `needs` declaration
 */
export const NeedsEntrySchema = z.union([
  JobNameSchema,
  z.object({ job: JobNameSchema }).passthrough(),
]);

/**
 * Raw dependency declaration, in any of its three accepted forms
 */
export const NeedsDeclarationSchema = z.union([
  JobNameSchema.describe("Single dependency name"),
  z.array(NeedsEntrySchema).describe("Names or structured entries exposing `job`"),
  z.record(z.string(), z.unknown()).describe("Mapping keyed by dependency name"),
]);

export type NeedsEntry = z.infer<typeof NeedsEntrySchema>;
export type NeedsDeclaration = z.infer<typeof NeedsDeclarationSchema>;

/**
 * A step: a bare script line, or an object with an action reference
 * (`uses`) and/or command text (`run`)
 */
export const StepDescriptorSchema = z.union([
  z.string(),
  z
    .object({
      uses: z.string().optional(),
      run: z.string().optional(),
    })
    .passthrough(),
]);

export type StepDescriptor = z.infer<typeof StepDescriptorSchema>;

export const JobRecordSchema = z
  .object({
    needs: NeedsDeclarationSchema.nullish(),
    steps: z.array(StepDescriptorSchema).default([]),
    estimatedDuration: z
      .number()
      .nonnegative()
      .finite()
      .optional()
      .describe("Measured duration in seconds; replaces the heuristic estimate"),
  })
  .passthrough();

export type JobRecordInput = z.input<typeof JobRecordSchema>;
export type JobRecord = z.output<typeof JobRecordSchema>;

export const JobMapSchema = z.record(JobNameSchema, JobRecordSchema);

export type JobMapInput = z.input<typeof JobMapSchema>;
export type JobMap = z.output<typeof JobMapSchema>;

/**
 * Job name → normalized dependency names
 */
export type DependencyMap = Record<string, string[]>;

/**
 * A job after normalization and duration estimation
 */
export interface AnalyzedJob {
  name: string;
  needs: string[];
  steps: StepDescriptor[];
  /** Seconds; heuristic unless the record supplied one */
  estimatedDuration: number;
  canParallelize: boolean;
  metadata: JobRecord;
}
