import { simpleGit, type SimpleGit } from "simple-git";

export type StationRevision = {
  sha: string;
  branch: string;
  dirty: boolean;
};

/**
 * Revision of the station project a plan was loaded from, for the run
 * report. Null when the directory is not a git work tree.
 */
export async function readStationRevision(repoPath: string, git?: SimpleGit): Promise<StationRevision | null> {
  try {
    const client = git ?? simpleGit(repoPath);
    if (!(await client.checkIsRepo())) return null;
    const sha = (await client.revparse(["HEAD"])).trim();
    const branch = (await client.revparse(["--abbrev-ref", "HEAD"])).trim();
    const status = await client.status();
    return { sha, branch, dirty: !status.isClean() };
  } catch {
    return null;
  }
}

/** "abc1234" or "abc1234-dirty". */
export function formatRevision(revision: StationRevision | null): string | null {
  if (!revision) return null;
  return revision.dirty ? `${revision.sha.slice(0, 7)}-dirty` : revision.sha.slice(0, 7);
}
