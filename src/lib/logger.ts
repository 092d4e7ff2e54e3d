import pino from 'pino'

let logger: pino.Logger | undefined

export function createLogger(level = 'info'): pino.Logger {
	if (logger) {
		logger.level = level
		return logger
	}

	logger = pino({
		name: 'range-verifier',
		level,
		base: null,
	})

	return logger
}

export function getLogger(): pino.Logger {
	return logger ?? createLogger(process.env.LOG_LEVEL ?? 'info')
}
