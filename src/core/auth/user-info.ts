// SPDX-License-Identifier: Apache-2.0

export interface UserInfo {
  name: string;
  uid?: string;
  groups: string[];
  extra: Record<string, string[]>;
}
