import { DerivationError } from "./errors.js";
import { DEFAULT_ROLES } from "./roles.js";
import { AgentTask } from "./task.js";
import type { RoleEntry } from "./types.js";

export function renderInstruction(role: RoleEntry, objective: string): string {
    return `Use the ${role.agent} agent with ${role.skills.join(", ")} skills to focus on ${role.perspective}: ${objective}`;
}

/** slot i には roles[i % roles.length] を割り当てる（足りなければ先頭から再利用） */
export function roleForSlot(roles: readonly RoleEntry[], index: number): RoleEntry {
    return roles[index % roles.length];
}

export function deriveTasks(
    objective: string,
    count: number,
    roles: readonly RoleEntry[] = DEFAULT_ROLES
): AgentTask[] {
    if (!Number.isInteger(count)) {
        throw new DerivationError(`worker count must be an integer: ${count}`);
    }
    if (!objective.trim()) {
        throw new DerivationError("objective is required");
    }
    if (roles.length === 0) {
        throw new DerivationError("role table is empty");
    }

    const tasks: AgentTask[] = [];
    for (let i = 0; i < count; i++) {
        const role = roleForSlot(roles, i);
        tasks.push(
            new AgentTask({
                label: role.agent,
                instruction: renderInstruction(role, objective),
                objective,
            })
        );
    }
    return tasks;
}
