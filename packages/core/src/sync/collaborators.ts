export type { RemoteRepository, RepositoryHost } from '../bitbucket/client.js';

/** Local working-copy operations the engine depends on. */
export interface VersionControl {
  hasWorkingCopy(dest: string): Promise<boolean>;
  clone(url: string, dest: string): Promise<void>;
  fetchAndUpdate(dest: string): Promise<void>;
  resolveHead(dest: string): Promise<string>;
  currentBranch(dest: string): Promise<string>;
  defaultBranch(dest: string): Promise<string>;
}

export class CollaboratorError extends Error {
  readonly operation: string;
  readonly target: string;

  constructor(operation: string, target: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${target}: ${detail}`, { cause });
    this.name = 'CollaboratorError';
    this.operation = operation;
    this.target = target;
  }
}
