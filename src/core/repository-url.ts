import * as path from "node:path";
import { pathToFileURL } from "node:url";

const SCP_LIKE = /^(?:[^@/]+@)?([^:/]+):(?!\/\/)(.+)$/;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Browsable https URL for a git remote URL:
 * `git@host:org/repo.git` and `ssh://git@host/org/repo.git` both become `https://host/org/repo`.
 */
export function toWebUrl(remoteUrl: string): string {
  const trimmed = remoteUrl.trim().replace(/\.git$/i, "").replace(/\/+$/, "");
  const scp = SCP_LIKE.exec(trimmed);
  if (scp) {
    const [, host, repoPath] = scp;
    return `https://${host}/${repoPath}`;
  }
  try {
    const url = new URL(trimmed);
    if (url.protocol === "http:" || url.protocol === "https:") {
      url.username = "";
      url.password = "";
      return url.toString().replace(/\/+$/, "");
    }
    return `https://${url.hostname}${url.pathname}`;
  } catch {
    return trimmed;
  }
}

/**
 * Remote URL in a form the notes plugin can parse. URLs and scp-style remotes
 * pass through; a local path (absolute, or relative to `baseDir`) becomes a
 * `file://` URL.
 */
export function toNotesRepositoryUrl(remoteUrl: string, baseDir: string): string {
  const trimmed = remoteUrl.trim();
  if (HAS_SCHEME.test(trimmed) || SCP_LIKE.test(trimmed)) return trimmed;
  return pathToFileURL(path.resolve(baseDir, trimmed)).href;
}
