/**
 * Azure DevOps Git REST API client
 * Handles listing repositories and pages of pull requests
 */

import type { PullRequest, Repository, ReviewerEntry } from '../domain/models';
import type {
  AzureError,
  AzureListResponse,
  AzurePullRequest,
  AzureRepository,
  AzureReviewer,
} from './types';

const API_VERSION = '7.0';

export class AzureDevOpsClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
  ) {
    super(message);
    this.name = 'AzureDevOpsClientError';
  }
}

/**
 * Read access to repositories and their pull requests
 */
export interface PullRequestSource {
  listRepositories(): Promise<Repository[]>;
  listPullRequests(repositoryId: string, skip: number, top: number): Promise<PullRequest[]>;
}

export interface AzureDevOpsClientOptions {
  organization: string;
  project: string;
  token: string;
  baseUrl: string;
}

/**
 * Build the Basic auth header Azure DevOps expects for a personal access token
 */
export function authHeader(token: string): string {
  return `Basic ${Buffer.from(`:${token}`).toString('base64')}`;
}

function toReviewerEntry(reviewer: AzureReviewer): ReviewerEntry {
  return {
    identity: reviewer.uniqueName ?? '',
    vote: typeof reviewer.vote === 'number' ? reviewer.vote : 0,
    reviewedAt: reviewer.reviewedDate ?? null,
  };
}

function toPullRequest(pr: AzurePullRequest): PullRequest {
  return {
    id: pr.pullRequestId,
    title: pr.title ?? '',
    createdAt: pr.creationDate ?? null,
    author: pr.createdBy?.displayName ?? '',
    reviewers: (pr.reviewers ?? []).map(toReviewerEntry),
  };
}

/**
 * Azure DevOps API client for a single organization/project
 */
export class AzureDevOpsClient implements PullRequestSource {
  private readonly projectUrl: string;
  private readonly authorization: string;

  constructor(options: AzureDevOpsClientOptions) {
    const base = options.baseUrl.replace(/\/+$/, '');
    this.projectUrl =
      `${base}/${encodeURIComponent(options.organization)}/${encodeURIComponent(options.project)}`;
    this.authorization = authHeader(options.token);
  }

  /**
   * Make an authenticated GET request and unwrap the list envelope
   */
  private async requestList<T>(endpoint: string): Promise<T[]> {
    const url = `${this.projectUrl}${endpoint}`;

    const response = await fetch(url, {
      headers: {
        Accept: 'application/json',
        Authorization: this.authorization,
      },
    });

    // An invalid token gets a 203 with the HTML sign-in page
    if (!response.ok || response.status === 203) {
      let errorMessage = `Azure DevOps API error: ${response.status} ${response.statusText}`;

      try {
        const errorBody = (await response.json()) as AzureError;
        if (errorBody.message) {
          errorMessage = `Azure DevOps API error: ${errorBody.message}`;
        }
      } catch {
        // Body is not JSON; keep the status line
      }

      throw new AzureDevOpsClientError(errorMessage, response.status, endpoint);
    }

    const data = (await response.json()) as AzureListResponse<T>;
    return data.value ?? [];
  }

  /**
   * List every repository in the project
   */
  async listRepositories(): Promise<Repository[]> {
    const repos = await this.requestList<AzureRepository>(
      `/_apis/git/repositories?api-version=${API_VERSION}`,
    );
    return repos.map((repo) => ({ id: repo.id, name: repo.name }));
  }

  /**
   * Fetch one page of pull requests in any status
   */
  async listPullRequests(repositoryId: string, skip: number, top: number): Promise<PullRequest[]> {
    const prs = await this.requestList<AzurePullRequest>(
      `/_apis/git/repositories/${encodeURIComponent(repositoryId)}/pullrequests` +
        `?searchCriteria.status=all&$top=${top}&$skip=${skip}&api-version=${API_VERSION}`,
    );
    return prs.map(toPullRequest);
  }
}
