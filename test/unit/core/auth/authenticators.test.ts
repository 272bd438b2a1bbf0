// SPDX-License-Identifier: Apache-2.0

import * as x509 from '@peculiar/x509';
import {expect} from 'chai';
import {before, beforeEach, describe, it} from 'mocha';

import {
  type AuthenticationRequest,
  type AuthenticationResponse,
  type Authenticator,
} from '../../../../src/core/auth/authenticator.js';
import {ClientCertAuthenticator, commonNameOf} from '../../../../src/core/auth/client-cert-authenticator.js';
import {DelegatingAuthenticator} from '../../../../src/core/auth/delegating-authenticator.js';
import {RequestHeaderAuthenticator} from '../../../../src/core/auth/request-header-authenticator.js';
import {TokenReviewAuthenticator} from '../../../../src/core/auth/token-review-authenticator.js';
import {CaBundle} from '../../../../src/core/certificates/ca-bundle.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {FakeTokenReviews} from '../../fixtures/fake-clientset.fixture.js';
import {RecordingCertificateGenerator} from '../../fixtures/recording-certificate-generator.fixture.js';

const noRetry = {initialDelay: Duration.ZERO, factor: 1, steps: 1};

class StaticAuthenticator implements Authenticator {
  public constructor(private readonly result: AuthenticationResponse | undefined | Error) {}

  public async authenticate(): Promise<AuthenticationResponse | undefined> {
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

describe('Authenticators', () => {
  describe('TokenReviewAuthenticator', () => {
    let tokenReviews: FakeTokenReviews;
    const bearer: AuthenticationRequest = {headers: {authorization: 'Bearer test-token'}};

    beforeEach(() => {
      tokenReviews = new FakeTokenReviews();
      tokenReviews.results.set('test-token', {
        authenticated: true,
        user: {name: 'jane', groups: ['developers'], extra: {}},
        audiences: ['metrics-api'],
      });
    });

    it('should ignore requests without a bearer token', async () => {
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ofSeconds(10), noRetry);

      expect(await authenticator.authenticate({headers: {}})).to.be.undefined;
      expect(await authenticator.authenticate({headers: {authorization: 'Basic dGVzdA=='}})).to.be.undefined;
      expect(await authenticator.authenticate({headers: {authorization: 'Bearer  '}})).to.be.undefined;
      expect(tokenReviews.calls).to.have.lengthOf(0);
    });

    it('should return the reviewed user and cache the answer', async () => {
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ofSeconds(10), noRetry, () => [
        'metrics-api',
      ]);

      const response = await authenticator.authenticate(bearer);
      await authenticator.authenticate({headers: {authorization: 'bearer test-token'}});

      expect(response?.user).to.deep.equal({name: 'jane', groups: ['developers'], extra: {}});
      expect(response?.audiences).to.deep.equal(['metrics-api']);
      expect(tokenReviews.calls).to.deep.equal([{token: 'test-token', audiences: ['metrics-api']}]);
    });

    it('should cache rejected tokens too', async () => {
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ofSeconds(10), noRetry);
      const unknown: AuthenticationRequest = {headers: {authorization: 'Bearer unknown-token'}};

      expect(await authenticator.authenticate(unknown)).to.be.undefined;
      expect(await authenticator.authenticate(unknown)).to.be.undefined;
      expect(tokenReviews.calls).to.have.lengthOf(1);
    });

    it('should ask every time with a zero TTL', async () => {
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ZERO, noRetry);

      await authenticator.authenticate(bearer);
      await authenticator.authenticate(bearer);

      expect(tokenReviews.calls).to.have.lengthOf(2);
    });

    it('should fail for reviews that report an error', async () => {
      tokenReviews.results.set('expired-token', {authenticated: false, error: 'token has expired'});
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ofSeconds(10), noRetry);
      const expired: AuthenticationRequest = {headers: {authorization: 'Bearer expired-token'}};

      await expect(authenticator.authenticate(expired)).to.be.rejectedWith('token review failed: token has expired');
      await expect(authenticator.authenticate(expired)).to.be.rejectedWith('token review failed: token has expired');
      expect(tokenReviews.calls).to.have.lengthOf(2);
    });

    it('should retry failed reviews', async () => {
      tokenReviews.failures = 1;
      const authenticator = new TokenReviewAuthenticator(tokenReviews, Duration.ofSeconds(10), {
        initialDelay: Duration.ofMillis(1),
        factor: 1,
        steps: 2,
      });

      expect((await authenticator.authenticate(bearer))?.user.name).to.equal('jane');
      expect(tokenReviews.calls).to.have.lengthOf(2);
    });
  });

  describe('DelegatingAuthenticator', () => {
    const jane: AuthenticationResponse = {user: {name: 'jane', groups: ['developers'], extra: {}}};

    it('should return the first user found, in the authenticated group', async () => {
      const authenticator = new DelegatingAuthenticator(
        [
          new StaticAuthenticator(undefined),
          new StaticAuthenticator(jane),
          new StaticAuthenticator({user: {name: 'john', groups: [], extra: {}}}),
        ],
        true,
      );

      expect(await authenticator.authenticate({headers: {}})).to.deep.equal({
        user: {name: 'jane', groups: ['developers', 'system:authenticated'], extra: {}},
      });
    });

    it('should not add the authenticated group twice', async () => {
      const member: AuthenticationResponse = {user: {name: 'jane', groups: ['system:authenticated'], extra: {}}};
      const authenticator = new DelegatingAuthenticator([new StaticAuthenticator(member)], false);

      expect(await authenticator.authenticate({headers: {}})).to.equal(member);
    });

    it('should fall back to the anonymous user', async () => {
      const authenticator = new DelegatingAuthenticator([new StaticAuthenticator(undefined)], true);

      expect(await authenticator.authenticate({headers: {}})).to.deep.equal({
        user: {name: 'system:anonymous', groups: ['system:unauthenticated'], extra: {}},
      });
    });

    it('should leave unrecognised requests unauthenticated without anonymous access', async () => {
      const authenticator = new DelegatingAuthenticator([new StaticAuthenticator(undefined)], false);

      expect(await authenticator.authenticate({headers: {}})).to.be.undefined;
    });

    it('should never treat rejected credentials as anonymous', async () => {
      const authenticator = new DelegatingAuthenticator(
        [new StaticAuthenticator(new Error('token has expired')), new StaticAuthenticator(undefined)],
        true,
      );

      await expect(authenticator.authenticate({headers: {}})).to.be.rejectedWith(
        'unable to authenticate the request: token has expired',
      );
    });

    it('should accept a user another authenticator recognises', async () => {
      const authenticator = new DelegatingAuthenticator(
        [new StaticAuthenticator(new Error('bad certificate')), new StaticAuthenticator(jane)],
        false,
      );

      expect((await authenticator.authenticate({headers: {}}))?.user.name).to.equal('jane');
    });
  });

  describe('client certificates', () => {
    let clientPem: string;
    let clientName: string;
    let proxyPem: string;
    let proxyName: string;
    let clientCA: CaBundle;
    let proxyCA: CaBundle;

    before(async () => {
      const generator = new RecordingCertificateGenerator();
      clientPem = (await generator.generate('jane', [], [])).certificatePem;
      proxyPem = (await generator.generate('front-proxy', [], [])).certificatePem;
      clientName = commonNameOf(new x509.X509Certificate(clientPem));
      proxyName = commonNameOf(new x509.X509Certificate(proxyPem));
      // self-signed certificates are their own authority
      clientCA = CaBundle.fromPem('client-ca', clientPem);
      proxyCA = CaBundle.fromPem('front-proxy-ca', proxyPem);
    });

    describe('ClientCertAuthenticator', () => {
      it('should ignore requests without a client certificate', async () => {
        expect(await new ClientCertAuthenticator(clientCA).authenticate({headers: {}})).to.be.undefined;
      });

      it('should take the user from the common name', async () => {
        const response = await new ClientCertAuthenticator(clientCA).authenticate({
          headers: {},
          clientCertificate: clientPem,
        });

        expect(clientName).to.match(/^jane@\d+$/);
        expect(response).to.deep.equal({user: {name: clientName, groups: [], extra: {}}});
      });

      it('should reject certificates of another authority', async () => {
        await expect(
          new ClientCertAuthenticator(clientCA).authenticate({headers: {}, clientCertificate: proxyPem}),
        ).to.be.rejectedWith(/^verifying certificate CN=front-proxy@\d+ failed: not signed by client-ca$/);
      });

      it('should reject certificates that cannot be parsed', async () => {
        await expect(
          new ClientCertAuthenticator(clientCA).authenticate({headers: {}, clientCertificate: 'not a certificate'}),
        ).to.be.rejectedWith('unable to parse client certificate');
      });
    });

    describe('RequestHeaderAuthenticator', () => {
      function requestHeaderAuthenticator(allowedClientNames: string[]): RequestHeaderAuthenticator {
        return new RequestHeaderAuthenticator({
          usernameHeaders: ['X-Remote-User'],
          groupHeaders: ['X-Remote-Group'],
          extraHeaderPrefixes: ['X-Remote-Extra-'],
          clientCA: proxyCA,
          allowedClientNames,
        });
      }

      it('should trust the headers set by the proxy', async () => {
        const response = await requestHeaderAuthenticator([proxyName]).authenticate({
          clientCertificate: proxyPem,
          headers: {
            'x-remote-user': 'jane',
            'x-remote-group': ['developers', 'operators'],
            'x-remote-extra-scopes': 'metrics',
            'x-remote-extra-reason%2fcode': ['on-call'],
          },
        });

        expect(response).to.deep.equal({
          user: {
            name: 'jane',
            groups: ['developers', 'operators'],
            extra: {scopes: ['metrics'], 'reason/code': ['on-call']},
          },
        });
      });

      it('should ignore requests without a username header', async () => {
        expect(
          await requestHeaderAuthenticator([]).authenticate({clientCertificate: proxyPem, headers: {}}),
        ).to.be.undefined;
      });

      it('should ignore headers when no proxy certificate was presented', async () => {
        expect(await requestHeaderAuthenticator([]).authenticate({headers: {'x-remote-user': 'jane'}})).to.be
          .undefined;
      });

      it('should reject proxies that are not allowed', async () => {
        await expect(
          requestHeaderAuthenticator(['aggregator']).authenticate({
            clientCertificate: proxyPem,
            headers: {'x-remote-user': 'jane'},
          }),
        ).to.be.rejectedWith(/^client certificate with common name "front-proxy@\d+" is not allowed to set request headers$/);
      });

      it('should reject certificates of another authority', async () => {
        await expect(
          requestHeaderAuthenticator([]).authenticate({clientCertificate: clientPem, headers: {'x-remote-user': 'jane'}}),
        ).to.be.rejectedWith(/not signed by front-proxy-ca$/);
      });
    });
  });
});
