// The package ships JavaScript only and has no @types counterpart.
declare module "@semantic-release/release-notes-generator" {
  export interface NotesCommit {
    hash: string;
    message: string;
  }

  export interface NotesRelease {
    version?: string;
    gitTag?: string;
    gitHead?: string;
  }

  export interface NotesContext {
    cwd?: string;
    commits: NotesCommit[];
    lastRelease: NotesRelease;
    nextRelease: NotesRelease & { version: string };
    options: { repositoryUrl: string };
  }

  export interface NotesPluginConfig {
    preset?: string;
    linkCompare?: boolean;
    linkReferences?: boolean;
  }

  export function generateNotes(
    pluginConfig: NotesPluginConfig,
    context: NotesContext,
  ): Promise<string>;
}
