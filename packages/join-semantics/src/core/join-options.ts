/**
 * Join settings with validation and change notification
 */

import { createLogger } from '../common/logger.js';
import { JoinSemanticsError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { parseJoinAlgorithms } from '../join/algorithm.js';

const log = createLogger('options');

export type OptionValue = string;

export interface OptionDefinition {
	defaultValue: OptionValue;
	aliases?: string[];
	description?: string;
	/** Throws when a value is not acceptable; runs before the value is stored */
	validate?: (value: OptionValue) => void;
	onChange?: OptionChangeListener;
}

export interface OptionChangeEvent {
	key: string;
	oldValue: OptionValue;
	newValue: OptionValue;
}

export type OptionChangeListener = (event: OptionChangeEvent) => void;

export const JOIN_ALGORITHM_OPTION = 'join_algorithm';
export const JOIN_DEFAULT_STRICTNESS_OPTION = 'join_default_strictness';

const DEFAULT_STRICTNESS_VALUES = ['all', 'any', ''];

/**
 * Options registry keyed case-insensitively, with aliases
 */
export class JoinOptionsManager {
	private options = new Map<string, OptionValue>();
	private definitions = new Map<string, OptionDefinition>();
	private aliases = new Map<string, string>(); // alias -> canonical key

	/**
	 * Register an option with its definition
	 */
	registerOption(key: string, definition: OptionDefinition): void {
		if (this.definitions.has(key)) {
			throw new JoinSemanticsError(`Option ${key} is already registered`, StatusCode.INTERNAL);
		}

		definition.validate?.(definition.defaultValue);
		this.definitions.set(key, definition);
		this.options.set(key, definition.defaultValue);

		if (definition.aliases) {
			for (const alias of definition.aliases) {
				if (this.aliases.has(alias.toLowerCase())) {
					throw new JoinSemanticsError(`Option alias ${alias} is already registered`, StatusCode.INTERNAL);
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
		const definition = this.requireDefinition(key);
		const canonicalKey = definition.key;
		const newValue = String(value);
		definition.validate?.(newValue);
		const oldValue = this.options.get(canonicalKey) ?? definition.defaultValue;

		if (oldValue === newValue) {
			return;
		}

		this.options.set(canonicalKey, newValue);
		log('Option %s changed: %j → %j', canonicalKey, oldValue, newValue);
		this.notifyListener(definition, { key: canonicalKey, oldValue, newValue });
	}

	getOption(key: string): OptionValue {
		const definition = this.requireDefinition(key);
		return this.options.get(definition.key) ?? definition.defaultValue;
	}

	getAllOptions(): Record<string, OptionValue> {
		const result: Record<string, OptionValue> = {};
		for (const [key, value] of this.options) {
			result[key] = value;
		}
		return result;
	}

	private requireDefinition(key: string): OptionDefinition & { key: string } {
		const canonicalKey = this.resolveKey(key);
		const definition = canonicalKey === null ? undefined : this.definitions.get(canonicalKey);
		if (canonicalKey === null || !definition) {
			throw new JoinSemanticsError(`Unknown option: ${key}`, StatusCode.ERROR);
		}
		return { ...definition, key: canonicalKey };
	}

	private resolveKey(key: string): string | null {
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

		return null;
	}

	private notifyListener(definition: OptionDefinition, event: OptionChangeEvent): void {
		if (!definition.onChange) {
			return;
		}
		try {
			definition.onChange(event);
		} catch (error) {
			log('Error in option change listener for %s: %s', event.key, error);
		}
	}
}

/**
 * Options manager with the join settings registered at their defaults.
 */
export function createJoinOptions(overrides: Record<string, unknown> = {}): JoinOptionsManager {
	const options = new JoinOptionsManager();

	options.registerOption(JOIN_ALGORITHM_OPTION, {
		defaultValue: 'default',
		aliases: ['joinAlgorithm'],
		description: 'Comma-separated join algorithms, tried in order',
		validate: value => { parseJoinAlgorithms(value); },
	});

	options.registerOption(JOIN_DEFAULT_STRICTNESS_OPTION, {
		defaultValue: 'all',
		aliases: ['joinDefaultStrictness'],
		description: 'Strictness of a JOIN written without ANY or ALL',
		validate: value => {
			if (!DEFAULT_STRICTNESS_VALUES.includes(value.trim().toLowerCase())) {
				throw new JoinSemanticsError(
					`Invalid value for ${JOIN_DEFAULT_STRICTNESS_OPTION}: '${value}'. Expected 'all', 'any' or ''`,
					StatusCode.ERROR
				);
			}
		},
	});

	for (const [key, value] of Object.entries(overrides)) {
		options.setOption(key, value);
	}

	return options;
}
