// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';
import {Flags as flags} from '../../commands/flags.js';
import {type FlagSet} from '../flags/flag-set.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type AdapterLogger} from '../logging/adapter-logger.js';
import {type AuditBackend} from '../audit/audit-backend.js';
import {LogAuditBackend} from '../audit/log-audit-backend.js';
import {loadAuditPolicy, PolicyRuleEvaluator} from '../audit/audit-policy.js';
import {type ServerConfig} from '../server/server-config.js';
import {type ConfigurableOptions} from './configurable-options.js';

export type AuditTarget = Pick<ServerConfig, 'auditBackend' | 'auditPolicyRuleEvaluator'>;

export class AuditOptions implements ConfigurableOptions<[AuditTarget]> {
  public policyFile = '';
  public logPath = '';
  public logMaxBackup = 0;
  public logMaxSize = 0;
  public logFormat = constants.AUDIT_LOG_FORMAT_JSON;

  private readonly logger: AdapterLogger;

  public constructor(logger?: AdapterLogger) {
    this.logger = patchInject(logger, InjectTokens.AdapterLogger, this.constructor.name);
  }

  public validate(): Error[] {
    const errors: Error[] = [];
    if (this.logPath === '') {
      return errors;
    }

    if (this.logMaxBackup < 0) {
      errors.push(
        new IllegalArgumentError(
          `--${flags.auditLogMaxBackup.name} ${this.logMaxBackup} must be a positive number`,
          this.logMaxBackup,
        ),
      );
    }
    if (this.logMaxSize < 0) {
      errors.push(
        new IllegalArgumentError(`--${flags.auditLogMaxSize.name} ${this.logMaxSize} must be a positive number`, this.logMaxSize),
      );
    }
    if (!constants.AUDIT_LOG_FORMATS.includes(this.logFormat)) {
      errors.push(
        new IllegalArgumentError(
          `invalid audit log format ${this.logFormat}, allowed formats are "${constants.AUDIT_LOG_FORMATS.join(',')}"`,
          this.logFormat,
        ),
      );
    }

    return errors;
  }

  public addFlags(fs: FlagSet): void {
    fs.add(flags.auditPolicyFile, value => (this.policyFile = value));
    fs.add(flags.auditLogPath, value => (this.logPath = value));
    fs.add(flags.auditLogMaxBackup, value => (this.logMaxBackup = value));
    fs.add(flags.auditLogMaxSize, value => (this.logMaxSize = value));
    fs.add(flags.auditLogFormat, value => (this.logFormat = value));
  }

  /**
   * Auditing is on only with both a policy and a log path
   * @throws AdapterError if the policy file can not be read or is invalid
   */
  public async applyTo(config: AuditTarget): Promise<void> {
    if (this.logPath && !this.policyFile) {
      this.logger.warn('No audit policy file provided, no events will be recorded for log backend');
    }
    const evaluator = this.policyFile ? new PolicyRuleEvaluator(loadAuditPolicy(this.policyFile)) : undefined;

    let backend: AuditBackend | undefined;
    if (evaluator && this.logPath) {
      backend = new LogAuditBackend({
        path: this.logPath,
        format: this.logFormat,
        maxSize: this.logMaxSize,
        maxBackups: this.logMaxBackup,
      });
    }

    config.auditBackend = backend;
    if (backend) {
      config.auditPolicyRuleEvaluator = evaluator;
    }
  }
}
