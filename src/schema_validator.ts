/**
 * Schema Validator - minimal JSON schema checks for config files and
 * completion responses
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type?: JsonType;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    /** When false, keys not listed in `properties` are errors. */
    additionalProperties?: boolean;
    items?: JsonSchema;
    minItems?: number;
    enum?: ReadonlyArray<string | number | boolean | null>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        if (schema.type && !this.matchesType(value, schema.type)) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${this.getType(value)}`,
            });
            return;
        }

        if (isRecord(value) && (schema.properties || schema.required)) {
            for (const req of schema.required ?? []) {
                if (!(req in value)) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }

            const props = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = props[key];
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                } else if (schema.additionalProperties === false) {
                    errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                }
            }
        }

        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s), got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum && !schema.enum.some((e) => e === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private matchesType(value: unknown, type: JsonType): boolean {
        if (type === 'integer') return typeof value === 'number' && Number.isInteger(value);
        if (type === 'number') return typeof value === 'number' && Number.isFinite(value);
        return this.getType(value) === type;
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}

export function formatErrors(result: ValidationResult): string {
    return result.errors.map((e) => `${e.path || '(root)'}: ${e.message}`).join('; ');
}
