import { execFileSync } from "child_process";
import { errorMessage } from "../errors.js";
import { logger } from "../core/logger.js";

export interface RemoteInfo {
  host: string;
  /** "org/repo"（Azure DevOpsでは "org/project"） */
  orgRepo: string;
  repo: string;
  defaultBranch: string;
}

export type GitRunner = (args: string[], cwd: string) => string;

const defaultGitRunner: GitRunner = (args, cwd) =>
  execFileSync("git", args, {
    cwd,
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "ignore"],
  }).trim();

const LINE_LINK_TEMPLATES: Array<{
  host: string;
  build: (remote: RemoteInfo, branch: string, path: string, line: number) => string;
}> = [
  {
    host: "github.com",
    build: (r, branch, path, line) => `https://${r.host}/${r.orgRepo}/blob/${branch}/${path}#L${line}`,
  },
  {
    host: "gitlab.com",
    build: (r, branch, path, line) => `https://${r.host}/${r.orgRepo}/-/blob/${branch}/${path}#L${line}`,
  },
  {
    // Azure DevOpsはファイル付近に飛ぶだけの簡易リンク
    host: "dev.azure.com",
    build: (r, branch, path, line) =>
      `https://${r.host}/${r.orgRepo}/_git/${r.repo}?path=/${path}&version=GB${branch}&line=${line}`,
  },
];

/**
 * git@host:org/repo(.git) と https://host/org/repo(.git) を解釈する
 */
export function parseRemoteUrl(url: string): Omit<RemoteInfo, "defaultBranch"> | null {
  const trimmed = url.trim().replace(/\.git$/, "");

  let host: string;
  let segments: string[];

  if (trimmed.startsWith("git@")) {
    const rest = trimmed.slice("git@".length);
    const colon = rest.indexOf(":");
    if (colon <= 0) return null;
    host = rest.slice(0, colon);
    segments = rest.slice(colon + 1).split("/").filter(Boolean);
  } else if (/^https?:\/\//.test(trimmed)) {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      return null;
    }
    host = parsed.host;
    segments = parsed.pathname.split("/").filter(Boolean);
  } else {
    return null;
  }

  // Azure DevOps: org/project/_git/repo
  const gitIndex = segments.indexOf("_git");
  if (gitIndex >= 1 && gitIndex + 1 < segments.length) {
    return {
      host,
      orgRepo: segments.slice(0, gitIndex).join("/"),
      repo: segments[gitIndex + 1],
    };
  }

  if (segments.length < 2) return null;
  const orgRepo = segments.slice(0, 2).join("/");
  return { host, orgRepo, repo: segments[1] };
}

/**
 * origin リモートとデフォルトブランチを推定（失敗時はnull）
 */
export function detectRemote(repoDir: string, git: GitRunner = defaultGitRunner): RemoteInfo | null {
  let url: string;
  try {
    url = git(["remote", "get-url", "origin"], repoDir);
  } catch (error) {
    logger.debug("No origin remote", { repoDir, error: errorMessage(error) });
    return null;
  }

  const parsed = parseRemoteUrl(url);
  if (!parsed) {
    logger.debug("Unrecognized remote URL", { repoDir, url });
    return null;
  }

  return { ...parsed, defaultBranch: detectBranch(repoDir, git) };
}

function detectBranch(repoDir: string, git: GitRunner): string {
  try {
    const ref = git(["symbolic-ref", "refs/remotes/origin/HEAD"], repoDir);
    return ref.replace(/^refs\/remotes\/origin\//, "");
  } catch (error) {
    logger.debug("origin/HEAD not set, falling back to current branch", { repoDir, error: errorMessage(error) });
  }

  try {
    const branch = git(["rev-parse", "--abbrev-ref", "HEAD"], repoDir);
    if (branch && branch !== "HEAD") return branch;
  } catch (error) {
    logger.debug("Cannot resolve current branch", { repoDir, error: errorMessage(error) });
  }

  return "main";
}

/**
 * 行へのWebリンクを作る。未対応ホストはnull
 */
export function buildLineLink(remote: RemoteInfo, branch: string, filePath: string, line: number): string | null {
  const template = LINE_LINK_TEMPLATES.find((t) => remote.host.includes(t.host));
  if (!template) return null;
  const encodedPath = filePath.split("/").map(encodeURIComponent).join("/");
  return template.build(remote, branch, encodedPath, line);
}
