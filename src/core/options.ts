/**
 * Extractor options with registration, aliases and change notification
 */

import { createLogger } from '../common/logger.js';
import { MisuseError, SqlscopeError, sqlscopeError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { DEFAULT_DIALECT, resolveDialect } from '../parser/index.js';

const log = createLogger('core:options');

export type OptionValue = string;

export interface OptionDefinition {
	defaultValue: OptionValue;
	aliases?: string[];
	description?: string;
	/** Validates and canonicalizes a new value; throws to reject it */
	normalize?: (value: string) => OptionValue;
	onChange?: OptionChangeListener;
}

export interface OptionChangeEvent {
	key: string;
	oldValue: OptionValue;
	newValue: OptionValue;
}

export type OptionChangeListener = (event: OptionChangeEvent) => void;

export interface ExtractorOptions {
	/** node-sql-parser database name */
	dialect?: string;
}

/**
 * Options manager preloaded with the extractor's options
 */
export class ExtractorOptionsManager {
	private options = new Map<string, OptionValue>();
	private definitions = new Map<string, OptionDefinition>();
	private aliases = new Map<string, string>(); // alias -> canonical key

	constructor() {
		this.registerOption('dialect', {
			defaultValue: DEFAULT_DIALECT,
			aliases: ['database'],
			description: 'SQL dialect handed to node-sql-parser',
			normalize: resolveDialect,
		});
	}

	/**
	 * Register an option with its definition
	 */
	registerOption(key: string, definition: OptionDefinition): void {
		if (this.definitions.has(key)) {
			throw new SqlscopeError(`Option ${key} is already registered`, StatusCode.INTERNAL);
		}

		this.definitions.set(key, definition);
		this.options.set(key, definition.defaultValue);

		if (definition.aliases) {
			for (const alias of definition.aliases) {
				if (this.aliases.has(alias.toLowerCase())) {
					throw new SqlscopeError(`Option alias ${alias} is already registered`, StatusCode.INTERNAL);
				}
				this.aliases.set(alias.toLowerCase(), key);
			}
		}

		log('Registered option %s (default: %j)', key, definition.defaultValue);
	}

	/**
	 * Set an option value and notify listeners
	 */
	setOption(key: string, value: unknown): void {
		const canonicalKey = this.requireKey(key);
		const definition = this.requireDefinition(canonicalKey);
		if (typeof value !== 'string') {
			throw new MisuseError(`Invalid value for option ${key}: expected a string, got ${typeof value}`);
		}
		const newValue = definition.normalize ? definition.normalize(value) : value;
		const oldValue = this.getStringOption(canonicalKey);

		if (oldValue === newValue) {
			return; // No change
		}

		this.options.set(canonicalKey, newValue);
		log('Option %s changed: %j → %j', canonicalKey, oldValue, newValue);

		if (definition.onChange) {
			try {
				definition.onChange({ key: canonicalKey, oldValue, newValue });
			} catch (error) {
				log('Error in option change listener for %s: %s', canonicalKey, error);
			}
		}
	}

	/**
	 * Apply every defined value of an options object
	 */
	applyOptions(options: ExtractorOptions): void {
		for (const [key, value] of Object.entries(options)) {
			if (value !== undefined) {
				this.setOption(key, value);
			}
		}
	}

	getStringOption(key: string): string {
		const value = this.options.get(this.requireKey(key));
		return value ?? sqlscopeError(`Option ${key} has no value`, StatusCode.INTERNAL);
	}

	/**
	 * Get all current options
	 */
	getAllOptions(): Record<string, OptionValue> {
		return Object.fromEntries(this.options);
	}

	/**
	 * Get all registered option definitions
	 */
	getOptionDefinitions(): Record<string, OptionDefinition> {
		const result: Record<string, OptionDefinition> = {};
		for (const [key, definition] of this.definitions) {
			result[key] = { ...definition };
		}
		return result;
	}

	private requireKey(key: string): string {
		const lowerKey = key.toLowerCase();

		const aliasTarget = this.aliases.get(lowerKey);
		if (aliasTarget) {
			return aliasTarget;
		}

		for (const registeredKey of this.definitions.keys()) {
			if (registeredKey.toLowerCase() === lowerKey) {
				return registeredKey;
			}
		}

		throw new MisuseError(`Unknown option: ${key}`);
	}

	private requireDefinition(key: string): OptionDefinition {
		return this.definitions.get(key) ?? sqlscopeError(`Option ${key} has no definition`, StatusCode.INTERNAL);
	}
}
