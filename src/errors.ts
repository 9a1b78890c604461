/**
 * Raised eagerly when pipeline tuning values are invalid (negative refractory
 * period, non-positive gap threshold, ...). Never raised for sparse data.
 */
export class ConfigurationError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`);
		this.name = 'ConfigurationError';
		this.issues = issues;
	}
}
