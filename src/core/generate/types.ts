/**
 * Types for planning and writing a generated tree.
 */
import type { AnswerValue } from '../values/types.js';
import type { Blueprint } from '../blueprint/types.js';
import type { ResolvedConfig } from '../resolver/resolver.js';

/**
 * What generation will do with one output path.
 */
export type PlannedFile =
  /** Not on disk yet */
  | { action: 'create'; path: string; content: string; checksum: string }
  /** On disk with the same content */
  | { action: 'identical'; path: string; content: string; checksum: string }
  /** On disk, unmodified since the last generation, and the output changed */
  | { action: 'update'; path: string; content: string; checksum: string; existing: string }
  /** On disk with content generation did not write */
  | { action: 'conflict'; path: string; content: string; checksum: string; existing: string }
  /** On disk and listed in `skip_if_exists` */
  | { action: 'skip'; path: string; content: string; checksum: string; existing: string }
  /** Recorded by the last generation but no longer selected */
  | { action: 'stale'; path: string; checksum: string; existing: string; modified: boolean };

export type PlanAction = PlannedFile['action'];

/**
 * Contents of an answers file.
 */
export interface AnswersRecord {
  /** Blueprint directory, relative to the destination, forward slashes */
  blueprint: string;
  seed: string;
  /** Output path → checksum of the generated content */
  files: Readonly<Record<string, string>>;
  /** Non-secret answers in resolution order */
  answers: Readonly<Record<string, AnswerValue>>;
}

export interface PlanInput {
  blueprint: Blueprint;
  config: ResolvedConfig;
  /** Record left by the previous generation, in update mode */
  previous?: AnswersRecord;
}

export interface GenerationPlan {
  destination: string;
  /** Rendered files in corpus order, then stale files by path */
  files: PlannedFile[];
  /** Answers file path relative to the destination */
  answersFile: string;
  record: AnswersRecord;
}

/** How `apply` treats `conflict` entries. */
export type ConflictPolicy = 'abort' | 'keep' | 'overwrite';

export interface ApplyOptions {
  onConflict?: ConflictPolicy;
  /** Delete stale files that were not modified since the last generation */
  prune?: boolean;
}

export interface ApplyResult {
  written: string[];
  kept: string[];
  removed: string[];
  answersFile: string;
}
