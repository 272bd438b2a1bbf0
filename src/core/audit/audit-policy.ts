// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as yaml from 'yaml';
import * as constants from '../constants.js';
import {DataValidationError} from '../errors/data-validation-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {type AuthorizationAttributes, isResourceRequest} from '../auth/authorization-attributes.js';
import {AuditLevel, AuditStage} from './audit-event.js';

export interface GroupResources {
  group: string;
  resources: string[];
  resourceNames: string[];
}

export interface PolicyRule {
  level: AuditLevel;
  users: string[];
  userGroups: string[];
  verbs: string[];
  resources: GroupResources[];
  namespaces: string[];
  nonResourceURLs: string[];
  omitStages: AuditStage[];
}

export interface AuditPolicy {
  apiVersion: string;
  kind: string;
  rules: PolicyRule[];
  omitStages: AuditStage[];
}

export interface RequestAuditConfig {
  level: AuditLevel;
  omitStages: AuditStage[];
}

export interface AuditPolicyRuleEvaluator {
  evaluatePolicyRule(attributes: AuthorizationAttributes): RequestAuditConfig;
}

const LEVELS = new Set<string>(Object.values(AuditLevel));
const STAGES = new Set<string>(Object.values(AuditStage));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLevel(value: unknown): value is AuditLevel {
  return typeof value === 'string' && LEVELS.has(value);
}

function isStage(value: unknown): value is AuditStage {
  return typeof value === 'string' && STAGES.has(value);
}

function stringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every(entry => typeof entry === 'string')) {
    throw new DataValidationError(`${field} must be a list of strings`, 'list of strings', value);
  }
  return value;
}

function stageList(value: unknown, field: string): AuditStage[] {
  return stringList(value, field).map(stage => {
    if (!isStage(stage)) {
      throw new DataValidationError(`${field} holds unknown stage "${stage}"`, [...STAGES].join(','), stage);
    }
    return stage;
  });
}

function hasPathMatch(specs: string[], path: string): boolean {
  return specs.some(spec => spec === '*' || spec === path || (spec.endsWith('*') && path.startsWith(spec.replace(/\*+$/, ''))));
}

/**
 * Parse and validate an audit policy document
 * @param text - the YAML or JSON document
 * @param source - where the document came from, used in errors
 * @throws DataValidationError if the document is not a valid policy
 */
export function parseAuditPolicy(text: string, source: string): AuditPolicy {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new IllegalArgumentError(`failed to parse audit policy file ${source}`, source, error);
  }
  if (!isRecord(document)) {
    throw new DataValidationError(`audit policy file ${source} is not an object`, 'Policy', typeof document);
  }

  const {apiVersion, kind} = document;
  if (typeof apiVersion !== 'string' || !constants.AUDIT_POLICY_API_VERSIONS.includes(apiVersion)) {
    throw new DataValidationError(
      `unsupported audit policy apiVersion in ${source}`,
      constants.AUDIT_POLICY_API_VERSIONS.join(','),
      apiVersion,
    );
  }
  if (kind !== 'Policy') {
    throw new DataValidationError(`unexpected audit policy kind in ${source}`, 'Policy', kind);
  }

  const rawRules = document.rules ?? [];
  if (!Array.isArray(rawRules)) {
    throw new DataValidationError(`rules of ${source} must be a list`, 'list', rawRules);
  }
  if (rawRules.length === 0) {
    throw new DataValidationError(`loaded illegal policy with 0 rules from ${source}`, 'at least one rule', 0);
  }

  const rules = rawRules.map((rawRule: unknown, index): PolicyRule => {
    const field = `rules[${index}]`;
    if (!isRecord(rawRule)) {
      throw new DataValidationError(`${field} must be an object`, 'object', rawRule);
    }
    const level = rawRule.level;
    if (!isLevel(level)) {
      throw new DataValidationError(`${field}.level is not a valid level`, [...LEVELS].join(','), level);
    }

    const rawResources = rawRule.resources ?? [];
    if (!Array.isArray(rawResources)) {
      throw new DataValidationError(`${field}.resources must be a list`, 'list', rawResources);
    }
    const resources = rawResources.map((groupResources: unknown, resourceIndex): GroupResources => {
      const resourceField = `${field}.resources[${resourceIndex}]`;
      if (!isRecord(groupResources)) {
        throw new DataValidationError(`${resourceField} must be an object`, 'object', groupResources);
      }
      const group = groupResources.group ?? '';
      if (typeof group !== 'string') {
        throw new DataValidationError(`${resourceField}.group must be a string`, 'string', group);
      }
      return {
        group,
        resources: stringList(groupResources.resources, `${resourceField}.resources`),
        resourceNames: stringList(groupResources.resourceNames, `${resourceField}.resourceNames`),
      };
    });

    const rule: PolicyRule = {
      level,
      users: stringList(rawRule.users, `${field}.users`),
      userGroups: stringList(rawRule.userGroups, `${field}.userGroups`),
      verbs: stringList(rawRule.verbs, `${field}.verbs`),
      resources,
      namespaces: stringList(rawRule.namespaces, `${field}.namespaces`),
      nonResourceURLs: stringList(rawRule.nonResourceURLs, `${field}.nonResourceURLs`),
      omitStages: stageList(rawRule.omitStages, `${field}.omitStages`),
    };

    if (rule.nonResourceURLs.length > 0 && (rule.resources.length > 0 || rule.namespaces.length > 0)) {
      throw new DataValidationError(
        `${field} may not mix nonResourceURLs with resources or namespaces`,
        'either nonResourceURLs or resources',
        'both',
      );
    }
    for (const url of rule.nonResourceURLs) {
      if (url.slice(0, -1).includes('*')) {
        throw new DataValidationError(`${field}.nonResourceURLs: only trailing * allowed in "${url}"`, 'trailing *', url);
      }
    }
    return rule;
  });

  return {apiVersion, kind, rules, omitStages: stageList(document.omitStages, 'omitStages')};
}

export function loadAuditPolicy(policyFile: string): AuditPolicy {
  return parseAuditPolicy(fs.readFileSync(policyFile, 'utf8'), policyFile);
}

/**
 * Finds the audit level of a request: the level of the first rule that matches it, `None` when no rule does.
 */
export class PolicyRuleEvaluator implements AuditPolicyRuleEvaluator {
  public constructor(private readonly policy: AuditPolicy) {}

  public evaluatePolicyRule(attributes: AuthorizationAttributes): RequestAuditConfig {
    const rule = this.policy.rules.find(candidate => PolicyRuleEvaluator.ruleMatches(candidate, attributes));
    if (!rule) {
      return {level: AuditLevel.NONE, omitStages: this.policy.omitStages};
    }
    return {level: rule.level, omitStages: [...new Set([...this.policy.omitStages, ...rule.omitStages])]};
  }

  private static ruleMatches(rule: PolicyRule, attributes: AuthorizationAttributes): boolean {
    const {user} = attributes;
    if (rule.users.length > 0 && !rule.users.includes(user.name)) {
      return false;
    }
    if (rule.userGroups.length > 0 && !user.groups.some(group => rule.userGroups.includes(group))) {
      return false;
    }
    if (rule.verbs.length > 0 && !rule.verbs.includes(attributes.verb)) {
      return false;
    }

    if (rule.namespaces.length > 0 || rule.resources.length > 0) {
      return PolicyRuleEvaluator.ruleMatchesResource(rule, attributes);
    }
    if (rule.nonResourceURLs.length > 0) {
      return !isResourceRequest(attributes) && hasPathMatch(rule.nonResourceURLs, attributes.path);
    }
    return true;
  }

  private static ruleMatchesResource(rule: PolicyRule, attributes: AuthorizationAttributes): boolean {
    if (!isResourceRequest(attributes)) {
      return false;
    }
    if (rule.namespaces.length > 0 && !rule.namespaces.includes(attributes.namespace ?? '')) {
      return false;
    }
    if (rule.resources.length === 0) {
      return true;
    }

    const resource = attributes.resource ?? '';
    const subresource = attributes.subresource ?? '';
    const combined = subresource ? `${resource}/${subresource}` : resource;
    const name = attributes.name ?? '';

    return rule.resources.some(groupResources => {
      if (groupResources.group !== (attributes.apiGroup ?? '')) {
        return false;
      }
      if (groupResources.resources.length === 0) {
        return true;
      }
      if (groupResources.resourceNames.length > 0 && !groupResources.resourceNames.includes(name)) {
        return false;
      }
      return groupResources.resources.some(
        candidate =>
          candidate === combined ||
          candidate === '*' ||
          (subresource.length > 0 && candidate.startsWith('*/') && candidate.slice(2) === subresource) ||
          (candidate.endsWith('/*') && candidate.slice(0, -2) === resource),
      );
    });
  }
}
