export interface CreateCommandOptions {
  name?: string;
  packageManager?: string;
}

export interface AddCommandOptions {
  feature?: string;
  provider?: string;
}

export interface ListCommandOptions {
  format?: string;
}
