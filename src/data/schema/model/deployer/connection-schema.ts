// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class ConnectionSchema {
  @Expose()
  public url: string;

  @Expose()
  public organization: string;

  @Expose()
  public space: string;

  @Expose()
  public accessToken: string;

  @Expose()
  public skipSslValidation: boolean;

  @Expose()
  public requestTimeoutSeconds: number;

  public constructor(
    url?: string,
    organization?: string,
    space?: string,
    accessToken?: string,
    skipSslValidation?: boolean,
    requestTimeoutSeconds?: number,
  ) {
    this.url = url ?? '';
    this.organization = organization ?? '';
    this.space = space ?? '';
    this.accessToken = accessToken ?? '';
    this.skipSslValidation = skipSslValidation ?? false;
    this.requestTimeoutSeconds = requestTimeoutSeconds ?? 60;
  }
}
