export class ConfigError extends Error {
	readonly path: string | null

	constructor(message: string, path: string | null = null, options?: ErrorOptions) {
		super(path ? `${path}: ${message}` : message, options)
		this.name = "ConfigError"
		this.path = path
	}
}

export class UnknownEventError extends Error {
	readonly eventName: string

	constructor(eventName: string) {
		super(`Unknown event: ${eventName}`)
		this.name = "UnknownEventError"
		this.eventName = eventName
	}
}

export class UnknownCommandError extends Error {
	readonly commandName: string

	constructor(commandName: string) {
		super(`Unknown command: ${commandName}`)
		this.name = "UnknownCommandError"
		this.commandName = commandName
	}
}
