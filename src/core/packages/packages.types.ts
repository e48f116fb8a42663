/**
 * Package Domain Types
 */

/**
 * A resolved Go package
 */
export interface PackageInfo {
  /** Slash-separated import path (e.g. "example.com/foo/bar") */
  importPath: string;
  /** Absolute directory holding the package sources */
  directory: string;
  /** The `src` directory of the workspace the package was found in */
  sourceRoot: string;
  /** Workspace root (a GOROOT or GOPATH entry) */
  root: string;
  /** Whether the package lives in the GOROOT tree */
  goroot: boolean;
}

/**
 * A workspace searched for packages
 */
export interface Workspace {
  root: string;
  /** Label used in error messages, e.g. "$GOPATH" */
  origin: '$GOROOT' | '$GOPATH';
}

/**
 * Resolves package identifiers to package metadata
 */
export interface PackageResolver {
  resolve(identifier: string): Promise<PackageInfo>;
}

/**
 * Options for the GOPATH-style resolver
 */
export interface GopathResolverOptions {
  /** GOPATH entries, searched in order */
  gopath: readonly string[];
  /** Optional GOROOT, searched before GOPATH */
  goroot?: string;
  /** Directory local identifiers are resolved against */
  cwd: string;
}
