// SPDX-License-Identifier: Apache-2.0

export interface ConfigMaps {
  /**
   * Read the data of a config map
   * @param namespace - the namespace of the config map
   * @param name - the name of the config map
   * @returns the data, or undefined if the config map does not exist
   * @throws KubeApiError for any other failure
   */
  read(namespace: string, name: string): Promise<Record<string, string> | undefined>;
}
