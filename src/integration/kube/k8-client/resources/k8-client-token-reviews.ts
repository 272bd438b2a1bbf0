// SPDX-License-Identifier: Apache-2.0

import {type AuthenticationV1Api, type V1TokenReview} from '@kubernetes/client-node';
import {type TokenReviewResult, type TokenReviews} from '../../resources/token-reviews.js';
import {KubeApiResponse} from '../../kube-api-response.js';

export class K8ClientTokenReviews implements TokenReviews {
  public constructor(private readonly authenticationApi: AuthenticationV1Api) {}

  public async create(token: string, audiences: string[]): Promise<TokenReviewResult> {
    const review: V1TokenReview = {
      apiVersion: 'authentication.k8s.io/v1',
      kind: 'TokenReview',
      spec: {token, audiences: audiences.length > 0 ? audiences : undefined},
    };

    const status = await this.authenticationApi.createTokenReview(review).then(
      ({body}) => body.status,
      (error: unknown) => {
        throw KubeApiResponse.wrap(error, 'create tokenreview');
      },
    );

    if (!status?.authenticated) {
      return {authenticated: false, error: status?.error};
    }

    return {
      authenticated: true,
      audiences: status.audiences,
      user: {
        name: status.user?.username ?? '',
        uid: status.user?.uid,
        groups: status.user?.groups ?? [],
        extra: status.user?.extra ?? {},
      },
    };
  }
}
