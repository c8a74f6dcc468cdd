/**
 * Schema Validator - JSON schema validation for serialized documents
 */

export interface ValidationIssue {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationIssue[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    additionalProperties?: JsonSchema;
    required?: string[];
    items?: JsonSchema;
    enum?: readonly unknown[];
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

    validate(document: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationIssue[] = [];
        this.validateValue(document, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationIssue[]
    ): void {
        // Type validation
        const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
        const actualType = this.getType(value);
        const typeOk = allowed.some(t => t === actualType || (t === 'number' && actualType === 'integer'));
        if (!typeOk) {
            errors.push({
                path,
                message: `Expected type ${allowed.join('|')}, got ${actualType}`,
            });
            return;
        }

        // Object validation
        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            const known = schema.properties || {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = known[key] || schema.additionalProperties;
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (Array.isArray(value) && schema.items) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        // Pattern validation
        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): JsonType | 'undefined' | 'other' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
        if (typeof value === 'string') return 'string';
        if (typeof value === 'boolean') return 'boolean';
        if (typeof value === 'object') return 'object';
        if (value === undefined) return 'undefined';
        return 'other';
    }
}
