/**
 * GitHub REST client for issue creation.
 */

import { GitHubApiError, isTimeoutError } from "./errors.js";

export const GITHUB_TIMEOUT_MS = 30_000;

export interface CreateIssueOptions {
  readonly apiUrl: string;
  readonly owner: string;
  readonly repo: string;
  readonly token: string;
  readonly title: string;
  readonly body: string;
  readonly labels?: readonly string[];
  readonly timeoutMs?: number;
}

export interface CreatedIssue {
  readonly number: number;
  readonly title: string;
  readonly htmlUrl: string;
  readonly labels: readonly string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const labelNames = (labels: unknown): string[] =>
  Array.isArray(labels)
    ? labels.flatMap((label: unknown) => {
        if (typeof label === "string") {
          return [label];
        }
        if (isRecord(label) && typeof label.name === "string") {
          return [label.name];
        }
        return [];
      })
    : [];

const parseCreatedIssue = (data: unknown): CreatedIssue | undefined => {
  if (
    !(
      isRecord(data) &&
      typeof data.number === "number" &&
      typeof data.title === "string" &&
      typeof data.html_url === "string"
    )
  ) {
    return undefined;
  }
  return {
    number: data.number,
    title: data.title,
    htmlUrl: data.html_url,
    labels: labelNames(data.labels),
  };
};

const readErrorMessage = async (response: Response): Promise<string> => {
  const data: unknown = await response.json().catch(() => undefined);
  if (isRecord(data) && typeof data.message === "string") {
    return data.message;
  }
  return response.statusText;
};

/**
 * Create an issue. The labels field is sent only when labels are given.
 */
export const createIssue = async (
  options: CreateIssueOptions
): Promise<CreatedIssue> => {
  const {
    apiUrl,
    owner,
    repo,
    token,
    title,
    body,
    labels,
    timeoutMs = GITHUB_TIMEOUT_MS,
  } = options;
  const base = apiUrl.replace(/\/+$/, "");
  const url = `${base}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/issues`;

  const payload = {
    title,
    body,
    ...(labels && labels.length > 0 && { labels }),
  };

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        Authorization: `token ${token}`,
        Accept: "application/vnd.github.v3+json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new GitHubApiError("GitHub API request timed out", 0);
    }
    throw new GitHubApiError(
      `Unable to connect to GitHub API at '${base}'`,
      0
    );
  }

  if (response.status !== 201) {
    const message = await readErrorMessage(response);
    throw new GitHubApiError(
      `Failed to create issue. HTTP status code: ${response.status}${message ? `\nResponse: ${message}` : ""}`,
      response.status
    );
  }

  const issue = parseCreatedIssue(
    await response.json().catch(() => undefined)
  );
  if (!issue) {
    throw new GitHubApiError("Unexpected response from GitHub API", 201);
  }
  return issue;
};
