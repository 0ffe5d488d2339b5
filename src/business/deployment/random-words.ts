// SPDX-License-Identifier: Apache-2.0

export interface RandomWords {
  adjective(): string;

  noun(): string;
}
