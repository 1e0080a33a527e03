// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import * as constants from '../constants.js';

/** A host reachable over the administrative SSH port. */
export class RemoteTarget {
  public constructor(
    public readonly host: string,
    public readonly port: number,
  ) {
    if (!constants.HOSTNAME_PATTERN.test(host)) {
      throw new IllegalArgumentError(`Invalid host '${host}'`, host);
    }
  }

  /**
   * Parses `host` or `host:port`.
   * @param value - the text to parse
   * @param defaultPort - the port used when none is given
   */
  public static parse(value: string, defaultPort: number): RemoteTarget {
    const text: string = value.trim();
    const match: RegExpMatchArray | null = /^([^\s:]+)(?::(\d+))?$/.exec(text);
    if (!match || !constants.HOSTNAME_PATTERN.test(match[1])) {
      throw new IllegalArgumentError(`Invalid host '${value}', expected <host> or <host>:<port>`, value);
    }
    const port: number = match[2] === undefined ? defaultPort : Number(match[2]);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      throw new IllegalArgumentError(`Invalid port in '${value}'`, value);
    }
    return new RemoteTarget(match[1], port);
  }

  public toString(): string {
    return `${this.host}:${this.port}`;
  }
}
