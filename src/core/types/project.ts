export interface ProjectSpec {
  readonly directory: string;
  readonly venvName: string;
  readonly pythonVersion: string;
  readonly packages: readonly string[];
  readonly envSource?: string;
}
