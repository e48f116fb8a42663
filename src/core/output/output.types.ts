/**
 * Output Domain Types
 */

/**
 * A destination for one generated page, held only while it is written
 */
export interface OutputHandle {
  /** File path written to, or null for a shared stream */
  readonly path: string | null;
  write(content: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Opens a destination for a package's page
 */
export interface OutputTarget {
  open(importPath: string): Promise<OutputHandle>;
}
