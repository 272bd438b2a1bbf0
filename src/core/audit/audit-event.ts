// SPDX-License-Identifier: Apache-2.0

import {type UserInfo} from '../auth/user-info.js';

export enum AuditLevel {
  NONE = 'None',
  METADATA = 'Metadata',
  REQUEST = 'Request',
  REQUEST_RESPONSE = 'RequestResponse',
}

export enum AuditStage {
  REQUEST_RECEIVED = 'RequestReceived',
  RESPONSE_STARTED = 'ResponseStarted',
  RESPONSE_COMPLETE = 'ResponseComplete',
  PANIC = 'Panic',
}

export interface AuditObjectReference {
  resource?: string;
  namespace?: string;
  name?: string;
  apiGroup?: string;
  apiVersion?: string;
  subresource?: string;
}

export interface AuditEvent {
  level: AuditLevel;
  auditID: string;
  stage: AuditStage;
  requestURI: string;
  verb: string;
  user: UserInfo;
  sourceIPs: string[];
  userAgent?: string;
  objectRef?: AuditObjectReference;
  responseStatus?: {code: number};
  requestReceivedTimestamp: string;
  stageTimestamp: string;
  annotations?: Record<string, string>;
}
