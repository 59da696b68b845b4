import { readFileSync } from 'node:fs';
import { request as httpRequest, type IncomingMessage } from 'node:http';
import { request as httpsRequest, type RequestOptions as HttpsRequestOptions } from 'node:https';
import type { SyncTarget } from '../config/settings.js';
import { logger } from '../logger.js';

export const CLOUD_API_BASE_URL = 'https://api.bitbucket.org/2.0';
const REQUEST_TIMEOUT_MS = 60_000;
const PAGE_SIZE = 100;

export type BitbucketAuth = {
  username: string;
  password: string;
};

export type TlsOptions = {
  insecure: boolean;
  caBundlePath?: string;
};

export type BitbucketConfig = {
  auth: BitbucketAuth;
  tls: TlsOptions;
  cloudApiBaseUrl?: string;
};

export type RemoteRepository = {
  slug: string;
  url: string;
};

export interface RepositoryHost {
  listRepositories(target: SyncTarget): Promise<RemoteRepository[]>;
}

export type HttpResponse = {
  status: number;
  body: string;
};

export type HttpGet = (
  url: string,
  init: { headers: Record<string, string>; tls: TlsOptions },
) => Promise<HttpResponse>;

export class BitbucketApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'BitbucketApiError';
    this.status = status;
  }
}

/** App password first, then an access token. Neither is ever read from the backing file. */
export function resolveBitbucketPassword(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of ['BITBUCKET_APP_PASSWORD', 'BITBUCKET_TOKEN']) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

export const httpGet: HttpGet = (url, init) => {
  const target = new URL(url);
  const isHttps = target.protocol === 'https:';
  const options: HttpsRequestOptions = {
    method: 'GET',
    headers: init.headers,
    timeout: REQUEST_TIMEOUT_MS,
  };
  if (isHttps) {
    options.rejectUnauthorized = !init.tls.insecure;
    if (init.tls.caBundlePath) options.ca = readFileSync(init.tls.caBundlePath);
  }

  return new Promise<HttpResponse>((resolve, reject) => {
    const onResponse = (res: IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('error', reject);
      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks).toString('utf8') });
      });
    };
    const req = isHttps
      ? httpsRequest(target, options, onResponse)
      : httpRequest(target, options, onResponse);
    req.on('timeout', () => {
      req.destroy(new Error(`Request to ${target.host} timed out after ${REQUEST_TIMEOUT_MS}ms`));
    });
    req.on('error', reject);
    req.end();
  });
};

type CloneLink = { name?: string; href?: string };

type CloudRepositoryPayload = {
  slug?: string;
  links?: { clone?: CloneLink[]; html?: { href?: string } };
};

type CloudPage = {
  values?: CloudRepositoryPayload[];
  next?: string;
};

type ServerRepositoryPayload = {
  slug?: string;
  links?: { clone?: CloneLink[] };
};

type ServerPage = {
  values?: ServerRepositoryPayload[];
  isLastPage?: boolean;
  nextPageStart?: number;
};

function basicAuthHeader(auth: BitbucketAuth): string {
  return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
}

function pickCloneUrl(links: CloneLink[] | undefined, name: string): string | undefined {
  return links?.find((link) => link.name === name)?.href;
}

// Clone links embed the username; git's credential helper supplies the secret.
function stripUserInfo(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = '';
    parsed.password = '';
    return parsed.toString();
  } catch {
    return url;
  }
}

export class BitbucketClient implements RepositoryHost {
  private readonly config: BitbucketConfig;
  private readonly get: HttpGet;

  constructor(config: BitbucketConfig, get: HttpGet = httpGet) {
    this.config = config;
    this.get = get;
  }

  async listRepositories(target: SyncTarget): Promise<RemoteRepository[]> {
    const repos =
      target.kind === 'cloud'
        ? await this.listCloud(target.workspace, target.project)
        : await this.listServer(target.baseUrl, target.project);
    logger.info({ target, count: repos.length }, 'Listed repositories');
    return repos;
  }

  private async requestJson<T>(url: string, label: string): Promise<T> {
    const response = await this.get(url, {
      headers: {
        Accept: 'application/json',
        Authorization: basicAuthHeader(this.config.auth),
      },
      tls: this.config.tls,
    });
    if (response.status === 401) {
      throw new BitbucketApiError(
        `${label} 401: use an app password or access token with repository read access.`,
        401,
      );
    }
    if (response.status !== 200) {
      throw new BitbucketApiError(`${label} ${response.status}: ${response.body.trim()}`, response.status);
    }
    try {
      return JSON.parse(response.body) as T;
    } catch {
      throw new BitbucketApiError(`${label} returned invalid JSON`, response.status);
    }
  }

  private async listCloud(workspace: string, project?: string): Promise<RemoteRepository[]> {
    const base = (this.config.cloudApiBaseUrl ?? CLOUD_API_BASE_URL).replace(/\/$/, '');
    const first = new URL(`${base}/repositories/${encodeURIComponent(workspace)}`);
    first.searchParams.set('pagelen', String(PAGE_SIZE));
    if (project) first.searchParams.set('q', `project.key="${project}"`);

    const repos: RemoteRepository[] = [];
    let next: string | undefined = first.toString();
    while (next) {
      const page: CloudPage = await this.requestJson<CloudPage>(next, 'Bitbucket Cloud API');
      for (const item of page.values ?? []) {
        const url = pickCloneUrl(item.links?.clone, 'https') ?? item.links?.html?.href;
        if (!item.slug || !url) continue;
        repos.push({ slug: item.slug, url: stripUserInfo(url) });
      }
      next = page.next || undefined;
    }
    return repos;
  }

  private async listServer(baseUrl: string, project: string): Promise<RemoteRepository[]> {
    const base = baseUrl.replace(/\/$/, '');
    const repos: RemoteRepository[] = [];
    let start = 0;
    for (;;) {
      const url = new URL(`${base}/rest/api/1.0/projects/${encodeURIComponent(project)}/repos`);
      url.searchParams.set('limit', String(PAGE_SIZE));
      url.searchParams.set('start', String(start));
      const page = await this.requestJson<ServerPage>(url.toString(), 'Bitbucket Server API');
      for (const item of page.values ?? []) {
        const cloneUrl = pickCloneUrl(item.links?.clone, 'http');
        if (!item.slug || !cloneUrl) continue;
        repos.push({ slug: item.slug, url: stripUserInfo(cloneUrl) });
      }
      if (page.isLastPage !== false || page.nextPageStart === undefined) break;
      start = page.nextPageStart;
    }
    return repos;
  }
}
