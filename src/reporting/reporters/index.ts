export { CLIReporter, type CLIReporterOptions } from './cli-reporter'
export { JSONReporter, type JSONReporterOptions } from './json-reporter'
