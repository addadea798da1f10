/**
 * TriggerMatcher - finds the flows whose triggers accept a user input
 */

import { resolveVariablePath, stringifyValue, substituteVariables } from '../utils';
import type { Value } from '../utils';
import type { Module, Trigger } from '../types/Ast.type';
import type { Context, MatchResult } from '../types/Environment.type';
import { ConditionEvaluator } from './ConditionEvaluator';

export class TriggerMatcher {
    /**
     * Match user input against every trigger of every module.
     *
     * Modules, flows and triggers are visited in insertion order and the result is
     * stably sorted by priority, highest first, so ties keep discovery order.
     */
    static match(input: string, modules: Iterable<Module>, context: Context): MatchResult[] {
        const results: MatchResult[] = [];

        for (const module of modules) {
            for (const flow of module.flows.values()) {
                for (const trigger of flow.triggers) {
                    if (!ConditionEvaluator.evaluateAll(trigger.conditions, context.variables)) {
                        continue;
                    }
                    if (TriggerMatcher.matches(trigger, input, context.variables)) {
                        results.push({ module, flow, trigger, priority: trigger.priority });
                    }
                }
            }
        }

        // Array.prototype.sort is stable
        return results.sort((a, b) => b.priority - a.priority);
    }

    /**
     * Test one trigger's pattern against the input. Conditions are not checked here.
     */
    static matches(trigger: Trigger, input: string, variables: ReadonlyMap<string, Value>): boolean {
        switch (trigger.type) {
            case 'user_says':
                return TriggerMatcher.matchesText(trigger.pattern, input, variables);
            case 'variable_equals': {
                const current = resolveVariablePath(trigger.pattern, variables);
                return current !== undefined && stringifyValue(current) === trigger.value;
            }
            case 'always':
                return true;
            case 'timer':
            case 'event':
            case 'api_response':
                return false;
        }
    }

    /**
     * Case-insensitive text match: exact, exact after `{var}` substitution,
     * `/regex/` search, or `*mid*`, `*suffix`, `prefix*` wildcards
     */
    static matchesText(pattern: string, input: string, variables: ReadonlyMap<string, Value>): boolean {
        const text = input.trim().toLowerCase();
        const lowered = pattern.toLowerCase();

        if (text === lowered) {
            return true;
        }
        if (text === substituteVariables(pattern, variables).toLowerCase()) {
            return true;
        }

        if (pattern.length >= 2 && pattern.startsWith('/') && pattern.endsWith('/')) {
            try {
                return new RegExp(pattern.slice(1, -1), 'i').test(input.trim());
            } catch {
                // An invalid expression never matches
                return false;
            }
        }

        if (lowered.length >= 2 && lowered.startsWith('*') && lowered.endsWith('*')) {
            return text.includes(lowered.slice(1, -1));
        }
        if (lowered.startsWith('*')) {
            return text.endsWith(lowered.slice(1));
        }
        if (lowered.endsWith('*')) {
            return text.startsWith(lowered.slice(0, -1));
        }

        return false;
    }
}
