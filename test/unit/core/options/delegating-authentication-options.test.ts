// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {expect} from 'chai';
import {after, afterEach, before, beforeEach, describe, it} from 'mocha';
import sinon from 'sinon';

import {DelegatingAuthenticationOptions} from '../../../../src/core/options/delegating-authentication-options.js';
import {DelegatingAuthenticator} from '../../../../src/core/auth/delegating-authenticator.js';
import {CaBundle} from '../../../../src/core/certificates/ca-bundle.js';
import {NotInClusterError} from '../../../../src/core/errors/not-in-cluster-error.js';
import {type AuthenticationInfo, type SecureServingInfo} from '../../../../src/core/server/server-config.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {KubeApiError} from '../../../../src/integration/kube/errors/kube-api-error.js';
import {RestClientConfigs} from '../../../../src/integration/kube/rest-client-config.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {type FakeClientset, FakeClientsetFactory} from '../../fixtures/fake-clientset.fixture.js';
import {RecordingCertificateGenerator} from '../../fixtures/recording-certificate-generator.fixture.js';
import {TestLogger} from '../../fixtures/test-logger.fixture.js';

const KUBECONFIG = PathEx.joinWithRealPath('test', 'data', 'kubeconfig.yaml');
const CONFIG_MAP_KEY = 'kube-system/extension-apiserver-authentication';
const CONFIG_MAP = 'configmap/extension-apiserver-authentication in kube-system';

describe('DelegatingAuthenticationOptions', () => {
  let clientCaPem: string;
  let frontProxyCaPem: string;
  let temporaryDirectory: string;

  let clientsetFactory: FakeClientsetFactory;
  let logger: TestLogger;
  let options: DelegatingAuthenticationOptions;
  let authenticationInfo: AuthenticationInfo;

  before(async () => {
    const generator = new RecordingCertificateGenerator();
    clientCaPem = (await generator.generate('client-ca', [], [])).certificatePem;
    frontProxyCaPem = (await generator.generate('front-proxy-ca', [], [])).certificatePem;
    temporaryDirectory = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'delegating-authn-'));
  });

  after(() => {
    fs.rmSync(temporaryDirectory, {recursive: true, force: true});
  });

  beforeEach(() => {
    clientsetFactory = new FakeClientsetFactory();
    logger = new TestLogger();
    options = new DelegatingAuthenticationOptions(clientsetFactory, logger);
    options.remoteKubeConfigFile = KUBECONFIG;
    authenticationInfo = {apiAudiences: []};
  });

  afterEach(() => sinon.restore());

  function publishConfigMap(data: Record<string, string>): void {
    clientsetFactory.prepare = (clientset: FakeClientset) => clientset.fakeConfigMaps.data.set(CONFIG_MAP_KEY, data);
  }

  function authenticator(): DelegatingAuthenticator {
    expect(authenticationInfo.authenticator).to.be.instanceOf(DelegatingAuthenticator);
    if (!(authenticationInfo.authenticator instanceof DelegatingAuthenticator)) {
      throw new TypeError('no delegating authenticator installed');
    }
    return authenticationInfo.authenticator;
  }

  describe('validate', () => {
    it('should accept the defaults', () => {
      expect(options.validate()).to.deep.equal([]);
    });

    it('should collect every problem', () => {
      options.requestHeader.usernameHeaders = ['x-remote-user', ' '];
      options.requestHeader.allowedNames = [''];
      options.cacheTtl = Duration.parse('-1s');
      options.webhookRetryBackoff = {...options.webhookRetryBackoff, steps: 0};

      expect(options.validate().map(error => error.message)).to.deep.equal([
        'empty value in "requestheader-username-headers"',
        'empty value in "requestheader-allowed-names"',
        '--authentication-token-webhook-cache-ttl must not be negative',
        'number of webhook retry attempts must be greater than 0, but is: 0',
      ]);
    });
  });

  describe('applyTo', () => {
    it('should build a delegated client with raised limits', async () => {
      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(clientsetFactory.configs).to.have.lengthOf(1);
      expect(clientsetFactory.configs[0].host).to.equal('https://127.0.0.1:6443');
      expect(clientsetFactory.configs[0].bearerToken).to.equal('test-token');
      expect(clientsetFactory.configs[0].qps).to.equal(200);
      expect(clientsetFactory.configs[0].burst).to.equal(400);
    });

    it('should look up missing certificate authorities in the cluster', async () => {
      publishConfigMap({
        'client-ca-file': clientCaPem,
        'requestheader-client-ca-file': frontProxyCaPem,
        'requestheader-username-headers': '["X-Remote-User"]',
        'requestheader-group-headers': '["X-Remote-Group"]',
        'requestheader-extra-headers-prefix': '["X-Remote-Extra-"]',
        'requestheader-allowed-names': '["front-proxy-client"]',
      });
      const servingInfo: SecureServingInfo = {listenAddress: '0.0.0.0:443', sniCertificates: [], cipherSuites: []};

      await options.applyTo(authenticationInfo, servingInfo, undefined);

      expect(servingInfo.clientCA?.name).to.equal(`${CONFIG_MAP}::client-ca-file`);
      expect(authenticationInfo.requestHeaderConfig?.clientCA.name).to.equal(
        `${CONFIG_MAP}::requestheader-client-ca-file`,
      );
      expect(authenticationInfo.requestHeaderConfig?.usernameHeaders).to.deep.equal(['X-Remote-User']);
      expect(authenticationInfo.requestHeaderConfig?.groupHeaders).to.deep.equal(['X-Remote-Group']);
      expect(authenticationInfo.requestHeaderConfig?.extraHeaderPrefixes).to.deep.equal(['X-Remote-Extra-']);
      expect(authenticationInfo.requestHeaderConfig?.allowedClientNames).to.deep.equal(['front-proxy-client']);
      expect(authenticator().size()).to.equal(3);
    });

    it('should leave the configuration as given when the config map does not exist', async () => {
      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(clientsetFactory.clientsets[0].fakeConfigMaps.reads).to.equal(1);
      expect(logger.messages('debug')).to.include(`${CONFIG_MAP} not found, leaving authentication configuration as given`);
      expect(authenticationInfo.requestHeaderConfig).to.be.undefined;
      expect(authenticator().size()).to.equal(1);
    });

    it('should not look up anything when both authorities are given', async () => {
      const clientCaFile = PathEx.join(temporaryDirectory, 'client-ca.crt');
      const frontProxyCaFile = PathEx.join(temporaryDirectory, 'front-proxy-ca.crt');
      fs.writeFileSync(clientCaFile, clientCaPem);
      fs.writeFileSync(frontProxyCaFile, frontProxyCaPem);
      options.clientCaFile = clientCaFile;
      options.requestHeader.clientCaFile = frontProxyCaFile;

      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(clientsetFactory.clientsets[0].fakeConfigMaps.reads).to.equal(0);
      expect(authenticationInfo.requestHeaderConfig?.clientCA.name).to.equal(frontProxyCaFile);
      expect(authenticationInfo.requestHeaderConfig?.usernameHeaders).to.deep.equal(['x-remote-user']);
      expect(authenticator().size()).to.equal(3);
    });

    it('should merge the client authority into the one already served', async () => {
      const clientCaFile = PathEx.join(temporaryDirectory, 'merged-client-ca.crt');
      fs.writeFileSync(clientCaFile, clientCaPem);
      options.clientCaFile = clientCaFile;
      options.skipInClusterLookup = true;
      const servingInfo: SecureServingInfo = {
        listenAddress: '0.0.0.0:443',
        sniCertificates: [],
        cipherSuites: [],
        clientCA: CaBundle.fromPem('existing', frontProxyCaPem),
      };

      await options.applyTo(authenticationInfo, servingInfo, undefined);

      expect(servingInfo.clientCA?.name).to.equal(`existing,${clientCaFile}`);
      expect(servingInfo.clientCA?.certificates).to.have.lengthOf(2);
    });

    it('should skip the lookup when asked to', async () => {
      options.skipInClusterLookup = true;

      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(clientsetFactory.clientsets[0].fakeConfigMaps.reads).to.equal(0);
    });

    it('should fail when the lookup fails', async () => {
      clientsetFactory.prepare = (clientset: FakeClientset) => (clientset.fakeConfigMaps.failure = new Error('forbidden'));

      await expect(options.applyTo(authenticationInfo, undefined, undefined)).to.be.rejectedWith(
        'unable to load configmap based request-header-client-ca-file: forbidden',
      );
      expect(authenticationInfo.authenticator).to.be.undefined;
    });

    it('should explain how to grant access when the lookup is forbidden', async () => {
      clientsetFactory.prepare = (clientset: FakeClientset) =>
        (clientset.fakeConfigMaps.failure = new KubeApiError('failed to read configmap', 403));

      await expect(options.applyTo(authenticationInfo, undefined, undefined)).to.be.rejectedWith(
        'unable to load configmap based request-header-client-ca-file: failed to read configmap [statusCode: 403]',
      );
      expect(logger.messages('warn')).to.deep.equal([
        `Unable to get ${CONFIG_MAP}. Usually fixed by 'kubectl create rolebinding -n kube-system ROLEBINDING_NAME --role=extension-apiserver-authentication-reader --serviceaccount=YOUR_NS:YOUR_SA'`,
      ]);
    });

    it('should continue without the looked up configuration when failures are tolerated', async () => {
      clientsetFactory.prepare = (clientset: FakeClientset) => (clientset.fakeConfigMaps.failure = new Error('forbidden'));
      options.tolerateInClusterLookupFailure = true;

      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(logger.messages('warn')).to.deep.equal([
        'Error looking up in-cluster authentication configuration: forbidden',
        'Continuing without authentication configuration. This may treat all requests as anonymous.',
        'To require authentication configuration lookup to succeed, set --authentication-tolerate-lookup-failure=false',
      ]);
      expect(authenticator().size()).to.equal(1);
    });

    it('should reject header lists that are not lists of strings', async () => {
      publishConfigMap({
        'requestheader-client-ca-file': frontProxyCaPem,
        'requestheader-username-headers': '"X-Remote-User"',
      });

      await expect(options.applyTo(authenticationInfo, undefined, undefined)).to.be.rejectedWith(
        'unable to load configmap based request-header-client-ca-file: invalid value for requestheader-username-headers: expected a list of strings',
      );
    });

    it('should warn about what cannot be looked up without a client', async () => {
      sinon.stub(RestClientConfigs, 'inCluster').throws(new NotInClusterError());
      options.remoteKubeConfigFile = '';
      options.remoteKubeConfigFileOptional = true;

      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(clientsetFactory.configs).to.have.lengthOf(0);
      expect(logger.messages('warn')).to.deep.equal([
        `No authentication-kubeconfig provided in order to lookup client-ca-file in ${CONFIG_MAP}, so client certificate authentication won't work.`,
        `No authentication-kubeconfig provided in order to lookup requestheader-client-ca-file in ${CONFIG_MAP}, so request-header client certificate authentication won't work.`,
      ]);
      expect(authenticator().size()).to.equal(0);
      expect(await authenticator().authenticate({headers: {}})).to.deep.equal({
        user: {name: 'system:anonymous', groups: ['system:unauthenticated'], extra: {}},
      });
    });

    it('should fail without a client configuration unless it is optional', async () => {
      sinon.stub(RestClientConfigs, 'inCluster').throws(new NotInClusterError());
      options.remoteKubeConfigFile = '';

      await expect(options.applyTo(authenticationInfo, undefined, undefined)).to.be.rejectedWith(
        /^failed to get delegated authentication kubeconfig: unable to load in-cluster configuration/,
      );
    });

    it('should publish the API audiences', async () => {
      await options.applyTo(authenticationInfo, undefined, () => ['metrics-api']);

      expect(authenticationInfo.apiAudiences).to.deep.equal(['metrics-api']);
    });

    it('should reject anonymous requests when anonymous authentication is off', async () => {
      options.anonymous = false;

      await options.applyTo(authenticationInfo, undefined, undefined);

      expect(await authenticator().authenticate({headers: {}})).to.be.undefined;
    });
  });
});
