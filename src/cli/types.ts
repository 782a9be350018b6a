export enum OutputFormat {
  Line = "line",
  Json = "json",
}

export enum ExitCode {
  Success = 0,
  Failure = 1,
  NoConfiguration = 2,
}
