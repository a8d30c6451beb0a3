import type { ActionPipeline } from '../actions/action-pipeline';
import type { BundledFile } from '../output/bundle-writer';
import type { CliOverrides, GlobalConfig, Resolution } from '../presets/types';
import type { SecurityCheck, SecurityFinding } from '../security/secret-scanner';

export interface BundleRunOptions {
  sourceDir: string;
  config: GlobalConfig;
  cliOverrides: CliOverrides;
  concurrency: number;
  // Turn the first per-file failure into a failed run
  strict: boolean;
  securityCheck?: SecurityCheck;
  pipeline?: ActionPipeline;
  // Absolute paths to leave out of the listing
  skip?: string[];
  // Keep the resolution trace on every outcome
  explain?: boolean;
}

export enum SkipReason {
  Hidden = 'hidden',
  Binary = 'binary',
  TooLarge = 'exceeds max file size',
}

export type FileOutcome =
  | {
      status: 'bundled';
      path: string;
      file: BundledFile;
      resolution: Resolution;
      actionsRun: string[];
      findings: SecurityFinding[];
    }
  | { status: 'skipped'; path: string; reason: SkipReason; resolution: Resolution }
  | { status: 'failed'; path: string; error: Error };

export interface BundleRunResult {
  outcomes: FileOutcome[];
  bundled: BundledFile[];
  totalFiles: number;
  skipped: number;
  failed: number;
  warnings: number;
}
