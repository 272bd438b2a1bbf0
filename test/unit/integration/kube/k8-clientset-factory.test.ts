// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import each from 'mocha-each';

import {K8ClientsetFactory} from '../../../../src/integration/kube/k8-client/k8-clientset-factory.js';
import {K8Clientset} from '../../../../src/integration/kube/k8-client/k8-clientset.js';
import {K8SharedInformerFactory} from '../../../../src/integration/kube/informers/k8-shared-informer-factory.js';
import {type RestClientConfig} from '../../../../src/integration/kube/rest-client-config.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {TestLogger} from '../../fixtures/test-logger.fixture.js';

const base: RestClientConfig = {host: 'https://10.96.0.1:443', bearerToken: 'test-token', tls: {}, qps: 5, burst: 10};

describe('K8ClientsetFactory', () => {
  let factory: K8ClientsetFactory;

  beforeEach(() => {
    factory = new K8ClientsetFactory(new TestLogger());
  });

  describe('validate', () => {
    it('should accept a complete configuration', () => {
      expect(K8ClientsetFactory.validate(base)).to.equal('https://10.96.0.1:443');
    });

    it('should add the https scheme to a bare host:port', () => {
      expect(K8ClientsetFactory.validate({...base, host: 'kubernetes.default.svc:443'})).to.equal(
        'https://kubernetes.default.svc:443',
      );
    });

    each([
      {change: {host: ''}, message: 'host must be set'},
      {change: {host: 'ftp://10.96.0.1'}, message: 'host scheme must be http or https, got "ftp:"'},
      {change: {host: 'https://'}, message: 'host must be a URL or a host:port pair, got "https://"'},
      {change: {username: 'admin'}, message: 'username/password or bearer token may be set, but not both'},
      {
        change: {exec: {command: 'aws-iam-authenticator'}, authProvider: {name: 'oidc', config: {}}},
        message: 'exec credential plugin or auth provider may be set, but not both',
      },
      {change: {qps: -1}, message: 'qps must not be negative, got -1'},
      {change: {burst: -1}, message: 'burst must not be negative, got -1'},
      {change: {tls: {certData: 'certificate'}}, message: 'client certificate and key must be set together'},
      {change: {tls: {keyFile: '/etc/client.key'}}, message: 'client certificate and key must be set together'},
    ]).it('should reject %j', ({change, message}: {change: Partial<RestClientConfig>; message: string}) => {
      expect(() => K8ClientsetFactory.validate({...base, ...change})).to.throw(IllegalArgumentError, message);
    });
  });

  describe('newForConfig', () => {
    it('should build a clientset without contacting the server', () => {
      const clientset = factory.newForConfig({...base, host: '10.96.0.1:6443', userAgent: 'metrics-adapter'});

      expect(clientset).to.be.instanceOf(K8Clientset);
      expect(clientset.host()).to.equal('https://10.96.0.1:6443');
      expect(clientset.kubeConfig().getCurrentUser()?.token).to.equal('test-token');
      expect(clientset.flowSchemas().path).to.equal('/apis/flowcontrol.apiserver.k8s.io/v1/flowschemas');
      expect(clientset.priorityLevelConfigurations().path).to.equal(
        '/apis/flowcontrol.apiserver.k8s.io/v1/prioritylevelconfigurations',
      );
    });

    it('should refuse an invalid configuration', () => {
      expect(() => factory.newForConfig({...base, host: ''})).to.throw(IllegalArgumentError, 'host must be set');
    });
  });

  describe('newSharedInformerFactory', () => {
    it('should share one informer per resource without starting it', () => {
      const clientset = factory.newForConfig(base);
      const informerFactory = factory.newSharedInformerFactory(clientset, Duration.ofMinutes(10));

      expect(informerFactory).to.be.instanceOf(K8SharedInformerFactory);
      expect(informerFactory.resyncPeriod.toString()).to.equal('10m0s');

      const first = informerFactory.informerFor(clientset.flowSchemas());
      const again = informerFactory.informerFor(clientset.flowSchemas());
      const other = informerFactory.informerFor(clientset.priorityLevelConfigurations());

      expect(again).to.equal(first);
      expect(other).not.to.equal(first);
      expect(informerFactory.informers()).to.have.lengthOf(2);
      expect(first.hasStarted()).to.be.false;
      expect(first.list()).to.deep.equal([]);
    });
  });
});
