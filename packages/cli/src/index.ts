/**
 * @git-handle/cli
 *
 * Programmatic access to the git-handle command-line program.
 *
 * @packageDocumentation
 */

export { configureProgram } from './program.js';
export { runDoctor, type DoctorCheckResult, type DoctorOptions, type DoctorResult } from './commands/doctor.js';
export { EXIT_SOFTWARE, exitWithError, exitWithFatal } from './utils/error-reporter.js';
export { loadRepository, globalOptions, type GlobalOptions, type LoadedRepository } from './utils/repository-loader.js';
