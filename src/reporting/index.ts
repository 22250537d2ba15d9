export { CLIReporter, type CLIReporterOptions, JSONReporter, type JSONReporterOptions } from './reporters'
