// src/homekit/errors.ts

/**
 * selectSource() was given a name no input source of the television carries.
 */
export class SourceNotFoundError extends Error {
	constructor(public readonly source: string) {
		super(`Could not find source ${source}`);
		this.name = 'SourceNotFoundError';
	}
}
