import { resolveRole } from "../access/resolveRole";
import { Role } from "../access/roles";
import { can, ProjectAction } from "../utils/rbac";
import { AccessError } from "../utils/errors";
import type { ProjectRecord } from "../store/types";
import type { RequestContext, ServiceDeps } from "./context";

export interface ProjectAccess {
  project: ProjectRecord;
  role: Role;
}

export function createAccessService(deps: Pick<ServiceDeps, "store" | "directory">) {
  /** Project and the caller's role on it; null when the project does not exist. */
  async function resolve(ctx: RequestContext, projectId: string): Promise<ProjectAccess | null> {
    const project = await deps.store.findProject(projectId);
    if (!project) return null;
    return { project, role: await resolveRole(deps, project, ctx.actor) };
  }

  /**
   * Resolve and gate in one step. Projects the caller has no role on are
   * reported as missing; visible projects with too little role are denied.
   */
  async function authorize(ctx: RequestContext, projectId: string, action: ProjectAction): Promise<ProjectAccess> {
    const access = await resolve(ctx, projectId);
    if (!access || access.role === "none") {
      throw new AccessError("NotFound", "Project not found");
    }
    if (!can(access.role, action)) {
      ctx.log.info(
        { event: "access.denied", projectId, userId: ctx.actor?.id, role: access.role, action },
        "permission denied"
      );
      throw new AccessError("PermissionDenied", `Your role (${access.role}) does not allow ${action.replace("_", " ")}`);
    }
    return access;
  }

  return { resolve, authorize };
}

export type AccessService = ReturnType<typeof createAccessService>;
