export interface CreateCommandOptions {
  dir?: string;
  venv?: string;
  packages?: string;
  python?: string;
  envFrom?: string;
  git?: boolean;
  tree?: boolean;
  strict?: boolean;
  commandTimeout?: string;
}
