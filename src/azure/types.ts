/**
 * Azure DevOps Git REST API response types
 * These types represent the raw responses; optional fields may be absent
 */

/**
 * Envelope used by every list endpoint
 */
export interface AzureListResponse<T> {
  count?: number;
  value?: T[];
}

/**
 * Git repository response
 */
export interface AzureRepository {
  id: string;
  name: string;
  url?: string;
  defaultBranch?: string;
}

/**
 * Identity reference (author, reviewer)
 */
export interface AzureIdentityRef {
  id?: string;
  displayName?: string;
  uniqueName?: string;
}

/**
 * Reviewer with vote on a pull request
 */
export interface AzureReviewer extends AzureIdentityRef {
  vote?: number;
  reviewedDate?: string | null;
  isRequired?: boolean;
  hasDeclined?: boolean;
}

/**
 * Pull request response
 */
export interface AzurePullRequest {
  pullRequestId: number;
  title?: string;
  status?: 'active' | 'abandoned' | 'completed' | 'notSet' | 'all';
  creationDate?: string | null;
  createdBy?: AzureIdentityRef;
  reviewers?: AzureReviewer[];
}

/**
 * Error body returned on non-2xx responses
 */
export interface AzureError {
  message?: string;
  typeKey?: string;
}
