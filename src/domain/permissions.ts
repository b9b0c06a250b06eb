import { ForbiddenError } from "./errors";

export const staffActions = ["view_applications", "edit_application", "delete_application"] as const;
export type StaffAction = (typeof staffActions)[number];

export const staffRoles = ["admin", "hr", "recruteur"] as const;
export type StaffRole = (typeof staffRoles)[number];

export interface AuthorizationContext {
  actorId: string;
  role: StaffRole;
  permissions: ReadonlySet<StaffAction>;
}

export interface PermissionOracle {
  resolve(actorId: string, role: string): AuthorizationContext | undefined;
}

export const defaultRolePermissions: Record<StaffRole, readonly StaffAction[]> = {
  admin: ["view_applications", "edit_application", "delete_application"],
  hr: ["view_applications", "edit_application", "delete_application"],
  recruteur: ["view_applications", "edit_application"]
};

export class RoleTablePermissionOracle implements PermissionOracle {
  constructor(private readonly table: Record<StaffRole, readonly StaffAction[]> = defaultRolePermissions) {}

  resolve(actorId: string, role: string): AuthorizationContext | undefined {
    const knownRole = staffRoles.find((candidate) => candidate === role);
    if (!actorId || !knownRole) {
      return undefined;
    }

    return {
      actorId,
      role: knownRole,
      permissions: new Set(this.table[knownRole])
    };
  }
}

export const requirePermission = (auth: AuthorizationContext, action: StaffAction): void => {
  if (!auth.permissions.has(action)) {
    throw new ForbiddenError(`Role ${auth.role} is not allowed to ${action.replace(/_/g, " ")}.`);
  }
};
