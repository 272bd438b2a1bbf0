// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import each from 'mocha-each';

import {type AuthorizationAttributes} from '../../../../src/core/auth/authorization-attributes.js';
import {type AuthorizationResult, type Authorizer, Decision} from '../../../../src/core/auth/authorizer.js';
import {PathAuthorizer} from '../../../../src/core/auth/path-authorizer.js';
import {PrivilegedGroupsAuthorizer} from '../../../../src/core/auth/privileged-groups-authorizer.js';
import {SubjectAccessReviewAuthorizer} from '../../../../src/core/auth/subject-access-review-authorizer.js';
import {UnionAuthorizer} from '../../../../src/core/auth/union-authorizer.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeSubjectAccessReviews} from '../../fixtures/fake-clientset.fixture.js';

const jane = {name: 'jane', groups: ['developers'], extra: {}};

function nonResource(path: string): AuthorizationAttributes {
  return {user: jane, verb: 'get', path};
}

const podMetrics: AuthorizationAttributes = {
  user: jane,
  verb: 'get',
  path: '/apis/custom.metrics.k8s.io/v1beta2/namespaces/default/pods/*/cpu',
  namespace: 'default',
  apiGroup: 'custom.metrics.k8s.io',
  apiVersion: 'v1beta2',
  resource: 'pods',
  name: '*',
};

class StaticAuthorizer implements Authorizer {
  public calls = 0;

  public constructor(private readonly result: AuthorizationResult | Error) {}

  public async authorize(): Promise<AuthorizationResult> {
    this.calls++;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

const noRetry = {initialDelay: Duration.ZERO, factor: 1, steps: 1};

describe('Authorizers', () => {
  describe('PathAuthorizer', () => {
    const authorizer = new PathAuthorizer(['/healthz', '/readyz', '/debug/*']);

    each([
      {path: '/healthz', decision: Decision.ALLOW},
      {path: 'readyz', decision: Decision.ALLOW},
      {path: '/debug/pprof/heap', decision: Decision.ALLOW},
      {path: '/debug', decision: Decision.NO_OPINION},
      {path: '/healthz/etcd', decision: Decision.NO_OPINION},
      {path: '/metrics', decision: Decision.NO_OPINION},
    ]).it('should decide %j', async ({path, decision}: {path: string; decision: Decision}) => {
      expect((await authorizer.authorize(nonResource(path))).decision).to.equal(decision);
    });

    it('should have no opinion on resource requests', async () => {
      const everything = new PathAuthorizer(['*']);
      expect((await everything.authorize(podMetrics)).decision).to.equal(Decision.NO_OPINION);
      expect((await everything.authorize(nonResource('/anything'))).decision).to.equal(Decision.ALLOW);
    });

    it('should reject wildcards that are not trailing', () => {
      expect(() => new PathAuthorizer(['/api/*/status'])).to.throw(
        IllegalArgumentError,
        'only trailing * allowed in "api/*/status"',
      );
    });
  });

  describe('PrivilegedGroupsAuthorizer', () => {
    it('should allow members of the privileged groups only', async () => {
      const authorizer = new PrivilegedGroupsAuthorizer(['system:masters']);

      expect(
        (await authorizer.authorize({...podMetrics, user: {name: 'admin', groups: ['system:masters'], extra: {}}}))
          .decision,
      ).to.equal(Decision.ALLOW);
      expect((await authorizer.authorize(podMetrics)).decision).to.equal(Decision.NO_OPINION);
    });
  });

  describe('UnionAuthorizer', () => {
    it('should return the first decision', async () => {
      const deny = new StaticAuthorizer({decision: Decision.DENY, reason: 'denied'});
      const allow = new StaticAuthorizer({decision: Decision.ALLOW, reason: ''});

      const result = await new UnionAuthorizer([
        new StaticAuthorizer({decision: Decision.NO_OPINION, reason: ''}),
        deny,
        allow,
      ]).authorize(podMetrics);

      expect(result).to.deep.equal({decision: Decision.DENY, reason: 'denied'});
      expect(allow.calls).to.equal(0);
    });

    it('should collect the reasons when nobody decides', async () => {
      const result = await new UnionAuthorizer([
        new StaticAuthorizer({decision: Decision.NO_OPINION, reason: 'first'}),
        new StaticAuthorizer({decision: Decision.NO_OPINION, reason: ''}),
        new StaticAuthorizer({decision: Decision.NO_OPINION, reason: 'second'}),
      ]).authorize(podMetrics);

      expect(result).to.deep.equal({decision: Decision.NO_OPINION, reason: 'first\nsecond'});
    });

    it('should skip failing authorizers when another one decides', async () => {
      const result = await new UnionAuthorizer([
        new StaticAuthorizer(new Error('connection refused')),
        new StaticAuthorizer({decision: Decision.ALLOW, reason: ''}),
      ]).authorize(podMetrics);

      expect(result.decision).to.equal(Decision.ALLOW);
    });

    it('should raise the failures when nobody decides', async () => {
      const union = new UnionAuthorizer([
        new StaticAuthorizer(new Error('connection refused')),
        new StaticAuthorizer({decision: Decision.NO_OPINION, reason: ''}),
      ]);

      await expect(union.authorize(podMetrics)).to.be.rejectedWith('unable to authorize the request: connection refused');
    });
  });

  describe('SubjectAccessReviewAuthorizer', () => {
    let subjectAccessReviews: FakeSubjectAccessReviews;

    beforeEach(() => {
      subjectAccessReviews = new FakeSubjectAccessReviews();
    });

    it('should map the review to a decision', async () => {
      const authorizer = new SubjectAccessReviewAuthorizer(
        subjectAccessReviews,
        Duration.ZERO,
        Duration.ZERO,
        noRetry,
      );

      subjectAccessReviews.result = {allowed: true, denied: false, reason: 'allowed'};
      expect(await authorizer.authorize(podMetrics)).to.deep.equal({decision: Decision.ALLOW, reason: 'allowed'});

      subjectAccessReviews.result = {allowed: false, denied: true, reason: 'denied'};
      expect(await authorizer.authorize(podMetrics)).to.deep.equal({decision: Decision.DENY, reason: 'denied'});

      subjectAccessReviews.result = {allowed: false, denied: false, reason: ''};
      expect(await authorizer.authorize(podMetrics)).to.deep.equal({decision: Decision.NO_OPINION, reason: ''});
      expect(subjectAccessReviews.calls).to.have.lengthOf(3);
    });

    it('should cache answers per request', async () => {
      const authorizer = new SubjectAccessReviewAuthorizer(
        subjectAccessReviews,
        Duration.ofMinutes(5),
        Duration.ofSeconds(30),
        noRetry,
      );

      await authorizer.authorize(podMetrics);
      await authorizer.authorize(podMetrics);
      await authorizer.authorize({...podMetrics, verb: 'list'});

      expect(subjectAccessReviews.calls.map(call => call.verb)).to.deep.equal(['get', 'list']);
    });

    it('should retry failed reviews', async () => {
      subjectAccessReviews.failures = 2;
      const authorizer = new SubjectAccessReviewAuthorizer(subjectAccessReviews, Duration.ZERO, Duration.ZERO, {
        initialDelay: Duration.ofMillis(1),
        factor: 2,
        steps: 3,
      });

      expect((await authorizer.authorize(podMetrics)).decision).to.equal(Decision.NO_OPINION);
      expect(subjectAccessReviews.calls).to.have.lengthOf(3);
    });

    it('should give up once the retries are used up', async () => {
      subjectAccessReviews.failures = 5;
      const authorizer = new SubjectAccessReviewAuthorizer(subjectAccessReviews, Duration.ZERO, Duration.ZERO, {
        initialDelay: Duration.ZERO,
        factor: 1,
        steps: 2,
      });

      await expect(authorizer.authorize(podMetrics)).to.be.rejectedWith('webhook call failed after 2 attempt(s)');
      expect(subjectAccessReviews.calls).to.have.lengthOf(2);
    });
  });
});
