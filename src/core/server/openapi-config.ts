// SPDX-License-Identifier: Apache-2.0

export interface OpenApiInfo {
  title: string;
  version: string;
  description?: string;
}

export interface SecurityScheme {
  type: 'apiKey' | 'http' | 'oauth2' | 'openIdConnect';
  name?: string;
  in?: 'header' | 'query' | 'cookie';
  scheme?: string;
  description?: string;
}

/** schema definitions keyed by their fully qualified type name */
export type DefinitionsProvider = () => Record<string, object>;

export interface OpenApiConfig {
  info: OpenApiInfo;
  securityDefinitions?: Record<string, SecurityScheme>;
  getDefinitions: DefinitionsProvider;
}

export interface OpenApiV3Config {
  info: OpenApiInfo;
  securitySchemes?: Record<string, SecurityScheme>;
  getDefinitions: DefinitionsProvider;
}
