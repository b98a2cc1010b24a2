import { Console } from 'console'

export type Logger = { log(...lines: unknown[]): void }

// tracing output goes to stderr
export const logger: Logger = new Console({
	stdout: process.stderr,
	stderr: process.stderr,
	inspectOptions: { depth: 5 },
})
