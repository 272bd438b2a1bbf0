// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import * as constants from '../constants.js';
import {type AuditBackend} from './audit-backend.js';
import {type AuditEvent} from './audit-event.js';

const BYTES_PER_MEGABYTE = 1024 * 1024;

export interface LogAuditBackendOptions {
  /** file to write to, `-` for standard out */
  path: string;
  format: string;
  /** megabytes written before the file is rotated, 0 never rotates */
  maxSize: number;
  /** rotated files kept, 0 keeps all */
  maxBackups: number;
}

/**
 * Writes audit events one per line, either as JSON or in the legacy key="value" format.
 */
export class LogAuditBackend implements AuditBackend {
  private readonly logger: winston.Logger;

  public constructor(private readonly options: LogAuditBackendOptions) {
    this.logger = winston.createLogger({
      level: 'info',
      format: winston.format.printf(info => `${info.message}`),
      transports: [
        options.path === '-'
          ? new winston.transports.Stream({stream: process.stdout})
          : new winston.transports.File({
              filename: options.path,
              maxsize: options.maxSize > 0 ? options.maxSize * BYTES_PER_MEGABYTE : undefined,
              maxFiles: options.maxBackups > 0 ? options.maxBackups + 1 : undefined,
            }),
      ],
    });
  }

  public name(): string {
    return 'log';
  }

  public processEvents(...events: AuditEvent[]): void {
    for (const event of events) {
      this.logger.info(
        this.options.format === constants.AUDIT_LOG_FORMAT_LEGACY
          ? LogAuditBackend.legacyLine(event)
          : JSON.stringify(event),
      );
    }
  }

  public async shutdown(): Promise<void> {
    await new Promise<void>(resolve => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }

  public static legacyLine(event: AuditEvent): string {
    const {user, objectRef} = event;
    const fields = [
      `id="${event.auditID}"`,
      `stage="${event.stage}"`,
      `ip="${event.sourceIPs.join(',')}"`,
      `method="${event.verb}"`,
      `user="${user.name}"`,
      `groups="${user.groups.map(group => `"${group}"`).join(',')}"`,
      'as="<self>"',
      'asgroups="<lookup>"',
      `user-agent="${event.userAgent ?? ''}"`,
      `namespace="${objectRef?.namespace ?? ''}"`,
      `uri="${event.requestURI}"`,
    ];
    if (event.responseStatus) {
      fields.push(`response="${event.responseStatus.code}"`);
    }
    return `${event.stageTimestamp} AUDIT: ${fields.join(' ')}`;
  }
}
