/**
 * ModuleRegistry - loaded modules and the timer, event and API-response
 * registrations derived from their triggers
 */

import type { Module } from '../types/Ast.type';
import type { HandlerRegistration, TimerKey, TimerRegistration } from '../types/Environment.type';

export class ModuleRegistry {
    private readonly modules = new Map<string, Module>();
    private readonly timers = new Map<string, TimerRegistration[]>(); // by module name
    private readonly events = new Map<string, HandlerRegistration[]>();
    private readonly apiHandlers = new Map<string, HandlerRegistration[]>();

    constructor(private readonly clock: () => number = Date.now) {}

    /**
     * Register a module, replacing any module of the same name together with
     * all of its registrations. A replaced module keeps its position.
     */
    register(module: Module): void {
        this.removeRegistrations(module.name);
        this.modules.set(module.name, module);

        const now = this.clock();
        const timers: TimerRegistration[] = [];

        for (const flow of module.flows.values()) {
            for (const trigger of flow.triggers) {
                switch (trigger.type) {
                    case 'timer':
                        timers.push({
                            key: { module: module.name, flow: flow.name, pattern: trigger.pattern },
                            module,
                            flow,
                            trigger,
                            seconds: trigger.seconds,
                            lastRun: now
                        });
                        break;
                    case 'event':
                        ModuleRegistry.append(this.events, trigger.pattern, { module, flow, trigger });
                        break;
                    case 'api_response':
                        ModuleRegistry.append(this.apiHandlers, trigger.pattern, { module, flow, trigger });
                        break;
                    default:
                        break;
                }
            }
        }

        this.timers.set(module.name, timers);
    }

    /**
     * Remove a module and its registrations
     */
    unregister(name: string): boolean {
        if (!this.modules.has(name)) {
            return false;
        }
        this.removeRegistrations(name);
        this.modules.delete(name);
        return true;
    }

    get(name: string): Module | undefined {
        return this.modules.get(name);
    }

    has(name: string): boolean {
        return this.modules.has(name);
    }

    names(): string[] {
        return [...this.modules.keys()];
    }

    /**
     * Loaded modules in load order
     */
    all(): Module[] {
        return [...this.modules.values()];
    }

    /**
     * Timer registrations of every module, in registration order
     */
    timerRegistrations(): TimerRegistration[] {
        const result: TimerRegistration[] = [];
        for (const name of this.modules.keys()) {
            result.push(...(this.timers.get(name) ?? []));
        }
        return result;
    }

    findTimer(key: TimerKey): TimerRegistration | undefined {
        return this.timers.get(key.module)?.find(timer => timer.key.flow === key.flow && timer.key.pattern === key.pattern);
    }

    eventHandlers(event: string): HandlerRegistration[] {
        return [...(this.events.get(event) ?? [])];
    }

    apiResponseHandlers(name: string): HandlerRegistration[] {
        return [...(this.apiHandlers.get(name) ?? [])];
    }

    private removeRegistrations(moduleName: string): void {
        this.timers.delete(moduleName);
        for (const table of [this.events, this.apiHandlers]) {
            for (const [name, handlers] of table) {
                const kept = handlers.filter(handler => handler.module.name !== moduleName);
                if (kept.length === 0) {
                    table.delete(name);
                } else {
                    table.set(name, kept);
                }
            }
        }
    }

    private static append(table: Map<string, HandlerRegistration[]>, name: string, registration: HandlerRegistration): void {
        const handlers = table.get(name);
        if (handlers) {
            handlers.push(registration);
        } else {
            table.set(name, [registration]);
        }
    }
}
