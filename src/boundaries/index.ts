export { parseAnalyzeOptions, parseValidateConfigOptions } from './cli-parser';
export { parseEnvironment } from './env-parser';
