/**
 * Public type definitions
 *
 * Describes what a caller passes to the engine and what it gets back.
 */

/** Desired deployment state requested by the caller */
export type DesiredState = "installed" | "started" | "restarted";

/** Template variables made available to every rendered file */
export type Variables = Record<string, unknown>;

/**
 * One deployment invocation.
 */
export interface DeployRequest {
  /** Path to the application directory containing quadlets/, init.d/, config.d/ */
  source: string;

  /**
   * Application name used for prefixing. Derived from the source directory
   * base name when omitted; always lowercased.
   */
  name?: string;

  /** Desired state (default: "installed") */
  state?: DesiredState;

  /** Redeploy every file even if its digest is unchanged (default: false) */
  force?: boolean;

  /** Template variables */
  variables?: Variables;
}

/**
 * Supervisor action performed during orchestration, in call order.
 */
export type OrchestratorAction =
  | { type: "verify" }
  | { type: "reload" }
  | { type: "start"; unit: string }
  | { type: "restart"; unit: string };

/**
 * Deployment result
 */
export interface DeployResult {
  /** Whether any file or service state changed */
  changed: boolean;

  /** Normalized application name */
  applicationName: string;

  /** Main service name, e.g. "myapp--main.service" */
  serviceName: string;

  /** Deployed unit file names, e.g. ["myapp--db.container", "myapp--main.container"] */
  quadletFiles: string[];

  /** Absolute paths written in this run */
  changedFiles: string[];

  /** Absolute paths recorded by a previous run that this run no longer produces */
  staleFiles: string[];

  /** Supervisor actions performed */
  actions: OrchestratorAction[];

  /** Human-readable summary */
  message: string;
}

/**
 * Preview of a deployment, computed without touching the host
 */
export interface DeployPlan {
  applicationName: string;
  serviceName: string;
  files: PlannedFile[];
  staleFiles: string[];
  anyChanged: boolean;
}

export interface PlannedFile {
  path: string;
  content: string;
  mode: number;
  changed: boolean;
}
