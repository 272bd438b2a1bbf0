// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';

/**
 * Path helpers for the files the adapter reads and writes (certificates, kubeconfigs, audit policies and logs).
 *
 * Paths handed to these helpers come from operator supplied flags, so they are used as given and never confined to a
 * base directory.
 */
export class PathEx {
  private constructor() {}

  /**
   * Joins and normalizes the given path segments.
   * @param paths - the path segments to join
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given path segments into an absolute path.
   * @param paths - the path segments to resolve
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  /**
   * Joins the given path segments and resolves symbolic links; the target must exist.
   * @param paths - the path segments to join
   */
  public static joinWithRealPath(...paths: string[]): string {
    // nosemgrep
    return fs.realpathSync(path.join(...paths));
  }

  /**
   * Returns true when the file exists and the current process can read it.
   * @param file - the file to check
   */
  public static isReadable(file: string): boolean {
    try {
      fs.accessSync(file, fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }
}
