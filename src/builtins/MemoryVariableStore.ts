import { toValue } from '../utils';
import type { Value } from '../utils';
import type { VariableStore } from '../types/Environment.type';

/**
 * In-process VariableStore, keyed by user id. Values are copied in and out
 * through JSON so stored entries never alias a live context.
 */
export class MemoryVariableStore implements VariableStore {
    private readonly users = new Map<string, Map<string, string>>();

    async load(userId: string, names: string[]): Promise<Record<string, Value>> {
        const stored = this.users.get(userId);
        const values: Record<string, Value> = {};
        if (!stored) {
            return values;
        }
        for (const name of names) {
            const serialized = stored.get(name);
            if (serialized !== undefined) {
                values[name] = toValue(JSON.parse(serialized));
            }
        }
        return values;
    }

    async save(userId: string, values: Record<string, Value>): Promise<void> {
        const stored = this.users.get(userId) ?? new Map<string, string>();
        for (const [name, value] of Object.entries(values)) {
            stored.set(name, JSON.stringify(value));
        }
        this.users.set(userId, stored);
    }
}

