import { mkdir, mkdtemp, rm } from "node:fs/promises";
import path from "node:path";

import simpleGit, { type SimpleGitOptions } from "simple-git";

import {
  AuthError,
  GitTransferError,
  NetworkError,
  TransferTimeoutError,
  getErrorMessage,
  type MirrorSyncError
} from "../errors";
import type { TransferStrategy } from "../types";

export interface TransferOptions {
  timeoutMs: number;
  strategy: TransferStrategy;
  /** Required by the single-branch strategy. */
  branch: string | null;
}

export interface TransferResult {
  bytesTransferred: number;
  durationMs: number;
}

export interface TransferExecutor {
  transfer: (
    sourceUrl: string,
    destinationUrl: string,
    options: TransferOptions
  ) => Promise<TransferResult>;
}

/** The slice of simple-git the executor drives. */
export interface GitRunner {
  clone: (repoPath: string, localPath: string, options: string[]) => Promise<unknown>;
  raw: (commands: string[]) => Promise<string>;
}

export type GitFactory = (options: Partial<SimpleGitOptions>) => GitRunner;

export interface TransferExecutorOptions {
  workDir: string;
}

export interface TransferExecutorDependencies {
  gitFactory?: GitFactory;
  now?: () => number;
}

const AUTH_FAILURE_PATTERNS = [
  "Authentication failed",
  "could not read Username",
  "Invalid username or password",
  "The requested URL returned error: 401",
  "The requested URL returned error: 403"
];

const NETWORK_FAILURE_PATTERNS = [
  "Could not resolve host",
  "Connection refused",
  "Connection timed out",
  "Connection reset",
  "early EOF",
  "RPC failed",
  "unable to access",
  "Could not read from remote repository",
  "The requested URL returned error: 5"
];

export function translateGitError(
  operation: string,
  error: unknown,
  timedOut: boolean,
  timeoutMs: number
): MirrorSyncError {
  if (timedOut) {
    return new TransferTimeoutError(timeoutMs);
  }

  const message = getErrorMessage(error);
  const cause = error instanceof Error ? error : undefined;

  if (AUTH_FAILURE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new AuthError("git", null, `${operation}: ${message}`);
  }

  if (NETWORK_FAILURE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new NetworkError(operation, message, cause);
  }

  return new GitTransferError(operation, message, cause);
}

/** Sums loose and packed object sizes reported by `git count-objects -v` (KiB). */
export function parseCountObjectsBytes(output: string): number {
  let kib = 0;

  for (const line of output.split("\n")) {
    const match = /^(size|size-pack):\s*(\d+)\s*$/.exec(line.trim());
    if (match) {
      kib += Number.parseInt(match[2] ?? "0", 10);
    }
  }

  return kib * 1024;
}

export function createTransferExecutor(
  options: TransferExecutorOptions,
  dependencies: TransferExecutorDependencies = {}
): TransferExecutor {
  const gitFactory: GitFactory = dependencies.gitFactory ?? ((gitOptions) => simpleGit(gitOptions));
  const now = dependencies.now ?? Date.now;

  return {
    async transfer(
      sourceUrl: string,
      destinationUrl: string,
      transferOptions: TransferOptions
    ): Promise<TransferResult> {
      const { timeoutMs, strategy, branch } = transferOptions;
      if (strategy === "single-branch" && !branch) {
        throw new GitTransferError("clone", "single-branch transfer needs a branch");
      }

      await mkdir(options.workDir, { recursive: true });
      const scratchDir = await mkdtemp(path.join(options.workDir, "transfer-"));
      const repoDir = path.join(scratchDir, "repo.git");
      const controller = new AbortController();
      const timeoutId = setTimeout(() => {
        controller.abort();
      }, timeoutMs);
      const startedAtMs = now();
      let operation = "clone";

      try {
        const cloneGit = gitFactory({ baseDir: scratchDir, abort: controller.signal });

        if (strategy === "mirror") {
          await cloneGit.clone(sourceUrl, repoDir, ["--mirror"]);
        } else {
          await cloneGit.clone(sourceUrl, repoDir, [
            "--bare",
            "--single-branch",
            "--branch",
            branch ?? ""
          ]);
        }

        const repoGit = gitFactory({ baseDir: repoDir, abort: controller.signal });
        const bytesTransferred = parseCountObjectsBytes(
          await repoGit.raw(["count-objects", "-v"])
        );

        operation = "push";
        if (strategy === "mirror") {
          await repoGit.raw(["push", "--mirror", destinationUrl]);
        } else {
          await repoGit.raw(["push", destinationUrl, `refs/heads/${branch}:refs/heads/${branch}`]);
          await repoGit.raw(["push", destinationUrl, "--tags"]);
        }

        return {
          bytesTransferred,
          durationMs: now() - startedAtMs
        };
      } catch (error) {
        throw translateGitError(operation, error, controller.signal.aborted, timeoutMs);
      } finally {
        clearTimeout(timeoutId);
        await rm(scratchDir, { recursive: true, force: true });
      }
    }
  };
}
