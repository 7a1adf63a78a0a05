import fs from "node:fs";
import { z, ZodError } from "zod";
import { RoleTableError, errorMessage } from "./errors.js";
import type { RoleEntry } from "./types.js";

export const DEFAULT_ROLES: readonly RoleEntry[] = [
    {
        perspective: "Architecture & Security",
        agent: "security-auditor",
        skills: ["security-checklist", "api-patterns"],
    },
    {
        perspective: "Backend Implementation",
        agent: "backend-specialist",
        skills: ["nodejs-best-practices", "api-patterns"],
    },
    {
        perspective: "Frontend & UI/UX",
        agent: "frontend-specialist",
        skills: ["react-patterns", "tailwind-patterns"],
    },
    {
        perspective: "Testing",
        agent: "test-engineer",
        skills: ["testing-patterns", "webapp-testing"],
    },
    {
        perspective: "DevOps & Performance",
        agent: "devops-engineer",
        skills: ["deployment-procedures", "server-management"],
    },
];

const roleEntrySchema = z.object({
    perspective: z.string().trim().min(1),
    agent: z.string().trim().min(1),
    skills: z.array(z.string().trim().min(1)),
});

const roleTableSchema = z.array(roleEntrySchema).min(1, { message: "role table must not be empty" });

export function validateRoleTable(candidate: unknown): RoleEntry[] {
    try {
        return roleTableSchema.parse(candidate);
    } catch (err) {
        if (err instanceof ZodError) {
            const first = err.issues[0];
            const pathStr = first?.path?.length ? first.path.join(".") : "<root>";
            throw new RoleTableError(
                `Role table validation failed at ${pathStr}: ${first?.message ?? err.message}`,
                err
            );
        }
        throw new RoleTableError("Role table validation failed", err);
    }
}

export function loadRoleTable(filePath: string): RoleEntry[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
        throw new RoleTableError(`Failed to read role table at ${filePath}: ${errorMessage(err)}`, err);
    }
    return validateRoleTable(parsed);
}
