// SPDX-License-Identifier: Apache-2.0

import {type AuditEvent} from './audit-event.js';

export interface AuditBackend {
  name(): string;

  processEvents(...events: AuditEvent[]): void;

  /** flush and release whatever the backend writes to */
  shutdown(): Promise<void>;
}
