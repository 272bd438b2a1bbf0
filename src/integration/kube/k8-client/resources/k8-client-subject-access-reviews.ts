// SPDX-License-Identifier: Apache-2.0

import {type AuthorizationV1Api, type V1SubjectAccessReview} from '@kubernetes/client-node';
import {type SubjectAccessReviewResult, type SubjectAccessReviews} from '../../resources/subject-access-reviews.js';
import {type AuthorizationAttributes, isResourceRequest} from '../../../../core/auth/authorization-attributes.js';
import {KubeApiResponse} from '../../kube-api-response.js';

export class K8ClientSubjectAccessReviews implements SubjectAccessReviews {
  public constructor(private readonly authorizationApi: AuthorizationV1Api) {}

  public async create(attributes: AuthorizationAttributes): Promise<SubjectAccessReviewResult> {
    const review: V1SubjectAccessReview = {
      apiVersion: 'authorization.k8s.io/v1',
      kind: 'SubjectAccessReview',
      spec: {
        user: attributes.user.name,
        uid: attributes.user.uid,
        groups: attributes.user.groups,
        extra: attributes.user.extra,
        resourceAttributes: isResourceRequest(attributes)
          ? {
              namespace: attributes.namespace,
              verb: attributes.verb,
              group: attributes.apiGroup,
              version: attributes.apiVersion,
              resource: attributes.resource,
              subresource: attributes.subresource,
              name: attributes.name,
            }
          : undefined,
        nonResourceAttributes: isResourceRequest(attributes)
          ? undefined
          : {path: attributes.path, verb: attributes.verb},
      },
    };

    try {
      const {body} = await this.authorizationApi.createSubjectAccessReview(review);
      return {
        allowed: body.status?.allowed ?? false,
        denied: body.status?.denied ?? false,
        reason: body.status?.reason ?? body.status?.evaluationError ?? '',
      };
    } catch (error) {
      throw KubeApiResponse.wrap(error, 'create subjectaccessreview');
    }
  }
}
