// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';

import {DelegatingAuthorizationOptions} from '../../../../src/core/options/delegating-authorization-options.js';
import {type AuthorizationAttributes} from '../../../../src/core/auth/authorization-attributes.js';
import {Decision} from '../../../../src/core/auth/authorizer.js';
import {UnionAuthorizer} from '../../../../src/core/auth/union-authorizer.js';
import {NotInClusterError} from '../../../../src/core/errors/not-in-cluster-error.js';
import {type AuthorizationInfo} from '../../../../src/core/server/server-config.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {RestClientConfigs} from '../../../../src/integration/kube/rest-client-config.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {FakeClientsetFactory} from '../../fixtures/fake-clientset.fixture.js';
import {TestLogger} from '../../fixtures/test-logger.fixture.js';

const KUBECONFIG = PathEx.joinWithRealPath('test', 'data', 'kubeconfig.yaml');

const metricsRequest: AuthorizationAttributes = {
  user: {name: 'system:serviceaccount:kube-system:horizontal-pod-autoscaler', groups: [], extra: {}},
  verb: 'get',
  path: '/apis/custom.metrics.k8s.io/v1beta2/namespaces/default/pods/*/requests_per_second',
  namespace: 'default',
  apiGroup: 'custom.metrics.k8s.io',
  apiVersion: 'v1beta2',
  resource: 'pods',
  name: '*',
};

describe('DelegatingAuthorizationOptions', () => {
  let clientsetFactory: FakeClientsetFactory;
  let logger: TestLogger;
  let options: DelegatingAuthorizationOptions;
  let authorizationInfo: AuthorizationInfo;

  beforeEach(() => {
    clientsetFactory = new FakeClientsetFactory();
    logger = new TestLogger();
    options = new DelegatingAuthorizationOptions(clientsetFactory, logger);
    options.remoteKubeConfigFile = KUBECONFIG;
    authorizationInfo = {};
  });

  afterEach(() => sinon.restore());

  function authorizer(): UnionAuthorizer {
    expect(authorizationInfo.authorizer).to.be.instanceOf(UnionAuthorizer);
    if (!(authorizationInfo.authorizer instanceof UnionAuthorizer)) {
      throw new TypeError('no union authorizer installed');
    }
    return authorizationInfo.authorizer;
  }

  describe('validate', () => {
    it('should accept the defaults', () => {
      expect(options.validate()).to.deep.equal([]);
    });

    it('should collect every problem', () => {
      options.webhookRetryBackoff = {...options.webhookRetryBackoff, steps: -1};
      options.allowCacheTtl = Duration.parse('-5m');
      options.denyCacheTtl = Duration.parse('-10s');

      expect(options.validate().map(error => error.message)).to.deep.equal([
        'number of webhook retry attempts must be greater than 0, but is: -1',
        '--authorization-webhook-cache-authorized-ttl must not be negative',
        '--authorization-webhook-cache-unauthorized-ttl must not be negative',
      ]);
    });
  });

  describe('applyTo', () => {
    it('should chain privileged groups, allowed paths and subject access reviews', async () => {
      await options.applyTo(authorizationInfo);

      expect(authorizer().size()).to.equal(3);
      expect(clientsetFactory.configs[0].qps).to.equal(200);
      expect(clientsetFactory.configs[0].burst).to.equal(400);
    });

    it('should allow privileged groups without asking the API server', async () => {
      await options.applyTo(authorizationInfo);

      const result = await authorizer().authorize({
        ...metricsRequest,
        user: {name: 'admin', groups: ['system:masters'], extra: {}},
      });

      expect(result.decision).to.equal(Decision.ALLOW);
      expect(clientsetFactory.clientsets[0].fakeSubjectAccessReviews.calls).to.have.lengthOf(0);
    });

    it('should allow health checks to anyone', async () => {
      await options.applyTo(authorizationInfo);

      const result = await authorizer().authorize({
        user: {name: 'system:anonymous', groups: ['system:unauthenticated'], extra: {}},
        verb: 'get',
        path: '/readyz',
      });

      expect(result.decision).to.equal(Decision.ALLOW);
    });

    it('should ask the API server about everything else', async () => {
      await options.applyTo(authorizationInfo);
      const subjectAccessReviews = clientsetFactory.clientsets[0].fakeSubjectAccessReviews;

      expect(await authorizer().authorize(metricsRequest)).to.deep.equal({
        decision: Decision.NO_OPINION,
        reason: 'no RBAC policy matched',
      });
      expect(subjectAccessReviews.calls).to.deep.equal([metricsRequest]);
    });

    it('should use the configured cache TTLs', async () => {
      options.denyCacheTtl = Duration.ZERO;
      await options.applyTo(authorizationInfo);
      const subjectAccessReviews = clientsetFactory.clientsets[0].fakeSubjectAccessReviews;

      await authorizer().authorize(metricsRequest);
      await authorizer().authorize(metricsRequest);
      expect(subjectAccessReviews.calls).to.have.lengthOf(2);

      subjectAccessReviews.result = {allowed: true, denied: false, reason: 'RBAC: allowed'};
      const request = {...metricsRequest, verb: 'list'};
      await authorizer().authorize(request);
      await authorizer().authorize(request);
      expect(subjectAccessReviews.calls).to.have.lengthOf(3);
    });

    it('should skip what is not configured', async () => {
      options.alwaysAllowGroups = [];
      options.alwaysAllowPaths = [];

      await options.applyTo(authorizationInfo);

      expect(authorizer().size()).to.equal(1);
    });

    it('should warn when there is no client for subject access reviews', async () => {
      sinon.stub(RestClientConfigs, 'inCluster').throws(new NotInClusterError());
      options.remoteKubeConfigFile = '';
      options.remoteKubeConfigFileOptional = true;

      await options.applyTo(authorizationInfo);

      expect(logger.messages('warn')).to.deep.equal([
        "No authorization-kubeconfig provided, so SubjectAccessReview authorization won't work.",
      ]);
      expect(authorizer().size()).to.equal(2);
    });

    it('should reject wildcards inside an allowed path', async () => {
      options.alwaysAllowPaths = ['/metrics/*/raw'];

      await expect(options.applyTo(authorizationInfo)).to.be.rejectedWith('only trailing * allowed in "metrics/*/raw"');
      expect(authorizationInfo.authorizer).to.be.undefined;
    });
  });
});
