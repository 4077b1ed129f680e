import { z } from 'zod';
import { ConfigurationError } from '../errors/bindingErrors.js';

/**
 * Binding Configuration
 * Environment-driven options for the codec facade and the root logger.
 * Invalid values fail closed: every offending variable is reported at once.
 */

const flag = z.enum(['true', 'false']).transform(value => value === 'true');

export const BindingConfigSchema = z.object({
    ISO20022_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    // Require exactly one populated alternative on choices
    ISO20022_STRICT_CHOICES: flag.default('false'),
    ISO20022_UNKNOWN_ELEMENTS: z.enum(['ignore', 'reject']).default('ignore'),
    ISO20022_XML_DECLARATION: flag.default('true'),
});

export type LogLevel = z.infer<typeof BindingConfigSchema>['ISO20022_LOG_LEVEL'];

export interface BindingConfig {
    readonly logLevel: LogLevel;
    readonly strictChoices: boolean;
    readonly unknownElements: 'ignore' | 'reject';
    readonly xmlDeclaration: boolean;
}

/**
 * Reads the binding options from the environment.
 * Blank variables count as unset.
 */
export function loadBindingConfig(env: NodeJS.ProcessEnv = process.env): BindingConfig {
    const present: Record<string, string> = {};
    for (const [name, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            present[name] = value.trim();
        }
    }

    const result = BindingConfigSchema.safeParse(present);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    return {
        logLevel: result.data.ISO20022_LOG_LEVEL,
        strictChoices: result.data.ISO20022_STRICT_CHOICES,
        unknownElements: result.data.ISO20022_UNKNOWN_ELEMENTS,
        xmlDeclaration: result.data.ISO20022_XML_DECLARATION,
    };
}
