export class InvalidArgumentError extends RangeError {
	readonly paramName: string
	readonly value: unknown

	constructor(paramName: string, value: unknown, reason: string) {
		super(`${paramName} (${String(value)}) ${reason}.`)
		this.name = "InvalidArgumentError"
		this.paramName = paramName
		this.value = value
	}
}

export class NullBufferError extends TypeError {
	readonly paramName: string

	constructor(paramName = "buffer") {
		super(`${paramName} must not be null or undefined.`)
		this.name = "NullBufferError"
		this.paramName = paramName
	}
}
