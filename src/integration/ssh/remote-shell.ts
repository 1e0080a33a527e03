// SPDX-License-Identifier: Apache-2.0

import {type RemoteTarget} from '../../core/topology/remote-target.js';

export interface RemoteCommandOptions {
  /** Text written to the command's standard input. */
  readonly input?: string;
  /** A local file streamed to the command's standard input. */
  readonly inputFile?: string;
  /** Decompress `inputFile` while streaming it. */
  readonly gunzipInput?: boolean;
  /** A local file receiving the command's standard output instead of the returned string. */
  readonly outputFile?: string;
  /** Compress standard output into `outputFile`. */
  readonly gzipOutput?: boolean;
  /** An ssh client configuration to use, such as a tunnel's proxy rules. */
  readonly configFile?: string;
}

/** Runs one command on a remote host and returns its standard output. Non-zero exit rejects. */
export interface RemoteShell {
  exec(target: RemoteTarget, command: string, options?: RemoteCommandOptions): Promise<string>;
}
