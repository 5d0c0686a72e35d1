/**
 * @module graph/company-directory
 *
 * Fixed, parameterised reads over the company graph: employees, projects,
 * skills and departments. These bypass query generation entirely and expect
 * the company model (`WORKS_IN`, `HAS_SKILL`, `WORKS_ON`).
 */

import { z } from "zod";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { GraphNodeNotFoundError, GraphQueryError } from "./errors.js";
import type { GraphStore, QueryParameters } from "./types.js";

export interface DirectoryOptions {
  /** @default 30000 */
  timeoutMs: number;
  /** @default 1000 */
  maxRows: number;
}

const DEFAULT_DIRECTORY_OPTIONS: DirectoryOptions = { timeoutMs: 30000, maxRows: 1000 };

export interface EmployeeSummary {
  name: string;
  email: string | null;
  title: string | null;
  department: string;
  skills: string[];
}

export interface ProjectSummary {
  projectId: string;
  name: string;
  status: string | null;
  description: string | null;
  teamSize: number;
}

export interface SkillExpert {
  name: string;
  email: string | null;
  title: string | null;
  department: string;
  /** Level as stored, either a rank or a label such as "expert" */
  proficiency: string | number | null;
  yearsExperience: number | null;
}

export interface SkillExperts {
  skill: string;
  experts: SkillExpert[];
}

export interface DepartmentStats {
  department: string;
  employeeCount: number;
  /** Distinct active projects its employees work on */
  activeProjects: number;
}

export interface EmployeeProject {
  projectId: string;
  name: string;
  status: string | null;
  role: string | null;
  hoursPerWeek: number | null;
}

export interface EmployeeProjects {
  email: string;
  projects: EmployeeProject[];
}

export interface ProjectTeamMember {
  name: string;
  email: string | null;
  title: string | null;
  department: string | null;
  projectRole: string | null;
}

export interface ProjectTeam {
  projectId: string;
  projectName: string;
  status: string | null;
  team: ProjectTeamMember[];
}

export const EMPLOYEES_QUERY = `
MATCH (e:Employee)-[:WORKS_IN]->(d:Department)
WHERE $department IS NULL OR d.name = $department
OPTIONAL MATCH (e)-[:HAS_SKILL]->(s:Skill)
RETURN e.name AS name, e.email AS email, e.title AS title, d.name AS department,
       collect(DISTINCT s.name) AS skills
ORDER BY department, name`.trim();

export const PROJECTS_QUERY = `
MATCH (p:Project)
WHERE $status IS NULL OR p.status = $status
OPTIONAL MATCH (e:Employee)-[:WORKS_ON]->(p)
RETURN p.project_id AS project_id, p.name AS name, p.status AS status,
       p.description AS description, count(DISTINCT e) AS team_size
ORDER BY name`.trim();

export const SKILL_EXPERTS_QUERY = `
MATCH (e:Employee)-[r:HAS_SKILL]->(:Skill {name: $skill})
MATCH (e)-[:WORKS_IN]->(d:Department)
RETURN e.name AS name, e.email AS email, e.title AS title, d.name AS department,
       r.proficiency AS proficiency, r.years AS years
ORDER BY r.proficiency DESC, r.years DESC, name`.trim();

export const DEPARTMENT_STATS_QUERY = `
MATCH (d:Department)
OPTIONAL MATCH (e:Employee)-[:WORKS_IN]->(d)
OPTIONAL MATCH (e)-[:WORKS_ON]->(p:Project {status: 'active'})
RETURN d.name AS department, count(DISTINCT e) AS employee_count, count(DISTINCT p) AS active_projects
ORDER BY employee_count DESC, department`.trim();

export const EMPLOYEE_PROJECTS_QUERY = `
MATCH (:Employee {email: $email})-[r:WORKS_ON]->(p:Project)
RETURN p.project_id AS project_id, p.name AS name, p.status AS status,
       r.role AS role, r.hours_per_week AS hours
ORDER BY status, name`.trim();

export const PROJECT_TEAM_QUERY = `
MATCH (p:Project {project_id: $projectId})
OPTIONAL MATCH (e:Employee)-[r:WORKS_ON]->(p)
OPTIONAL MATCH (e)-[:WORKS_IN]->(d:Department)
RETURN p.name AS project_name, p.status AS status, e.name AS employee_name,
       e.email AS email, e.title AS title, d.name AS department, r.role AS project_role
ORDER BY project_role, employee_name`.trim();

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? null);
const amount = z
  .number()
  .nullish()
  .transform((value) => value ?? null);
const count = z.number().int().nonnegative();

const EmployeeRowSchema = z.object({
  name: z.string(),
  email: text,
  title: text,
  department: z.string(),
  skills: z.array(z.string()),
});

const ProjectRowSchema = z
  .object({
    project_id: z.string(),
    name: z.string(),
    status: text,
    description: text,
    team_size: count,
  })
  .transform(
    (row): ProjectSummary => ({
      projectId: row.project_id,
      name: row.name,
      status: row.status,
      description: row.description,
      teamSize: row.team_size,
    })
  );

const ExpertRowSchema = z
  .object({
    name: z.string(),
    email: text,
    title: text,
    department: z.string(),
    proficiency: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((value) => value ?? null),
    years: amount,
  })
  .transform(
    (row): SkillExpert => ({
      name: row.name,
      email: row.email,
      title: row.title,
      department: row.department,
      proficiency: row.proficiency,
      yearsExperience: row.years,
    })
  );

const DepartmentRowSchema = z
  .object({ department: z.string(), employee_count: count, active_projects: count })
  .transform(
    (row): DepartmentStats => ({
      department: row.department,
      employeeCount: row.employee_count,
      activeProjects: row.active_projects,
    })
  );

const EmployeeProjectRowSchema = z
  .object({ project_id: z.string(), name: z.string(), status: text, role: text, hours: amount })
  .transform(
    (row): EmployeeProject => ({
      projectId: row.project_id,
      name: row.name,
      status: row.status,
      role: row.role,
      hoursPerWeek: row.hours,
    })
  );

const TeamRowSchema = z.object({
  project_name: z.string(),
  status: text,
  employee_name: text,
  email: text,
  title: text,
  department: text,
  project_role: text,
});

/**
 * @example
 * ```typescript
 * const directory = new CompanyDirectory(store);
 * const { experts } = await directory.findSkillExperts("Kubernetes");
 * ```
 */
export class CompanyDirectory {
  private readonly options: DirectoryOptions;
  private _logger: pino.Logger | null = null;

  constructor(
    private readonly store: GraphStore,
    options: Partial<DirectoryOptions> = {}
  ) {
    this.options = { ...DEFAULT_DIRECTORY_OPTIONS, ...options };
  }

  private get logger(): pino.Logger {
    if (this._logger === null) {
      this._logger = getComponentLogger("graph:directory");
    }
    return this._logger;
  }

  async listEmployees(filter: { department?: string } = {}): Promise<EmployeeSummary[]> {
    return this.read("employees", EMPLOYEES_QUERY, { department: filter.department ?? null }, EmployeeRowSchema);
  }

  async listProjects(filter: { status?: string } = {}): Promise<ProjectSummary[]> {
    return this.read("projects", PROJECTS_QUERY, { status: filter.status ?? null }, ProjectRowSchema);
  }

  /**
   * Employees holding `skill`, most proficient and experienced first
   *
   * @throws {GraphNodeNotFoundError} when nobody has the skill
   */
  async findSkillExperts(skill: string): Promise<SkillExperts> {
    const experts = await this.read("skill experts", SKILL_EXPERTS_QUERY, { skill }, ExpertRowSchema);
    if (experts.length === 0) {
      throw new GraphNodeNotFoundError("Skill", skill, `No experts found for skill '${skill}'`);
    }
    return { skill, experts };
  }

  async departmentStats(): Promise<DepartmentStats[]> {
    return this.read("department stats", DEPARTMENT_STATS_QUERY, {}, DepartmentRowSchema);
  }

  /**
   * @throws {GraphNodeNotFoundError} when the employee works on no project
   */
  async employeeProjects(email: string): Promise<EmployeeProjects> {
    const projects = await this.read("employee projects", EMPLOYEE_PROJECTS_QUERY, { email }, EmployeeProjectRowSchema);
    if (projects.length === 0) {
      throw new GraphNodeNotFoundError("Employee", email, `No projects found for employee '${email}'`);
    }
    return { email, projects };
  }

  /**
   * A project with no members is returned with an empty team
   *
   * @throws {GraphNodeNotFoundError} when no project has the id
   */
  async projectTeam(projectId: string): Promise<ProjectTeam> {
    const rows = await this.read("project team", PROJECT_TEAM_QUERY, { projectId }, TeamRowSchema);
    const first = rows[0];
    if (first === undefined) {
      throw new GraphNodeNotFoundError("Project", projectId, `Project '${projectId}' not found`);
    }
    const team = rows.flatMap((row): ProjectTeamMember[] =>
      row.employee_name === null
        ? []
        : [
            {
              name: row.employee_name,
              email: row.email,
              title: row.title,
              department: row.department,
              projectRole: row.project_role,
            },
          ]
    );
    return { projectId, projectName: first.project_name, status: first.status, team };
  }

  private async read<T>(
    operation: string,
    cypher: string,
    params: QueryParameters,
    rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const startTime = Date.now();
    const { rows, truncated } = await this.store.executeRead(cypher, params, this.options);
    const parsed = z.array(rowSchema).safeParse(rows);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : parsed.error.message;
      throw new GraphQueryError(`Unexpected ${operation} row shape (${where})`, cypher);
    }

    this.logger.info(
      { metric: "directory.read_ms", value: Date.now() - startTime, operation, rows: rows.length, truncated },
      "Directory read"
    );
    if (truncated) {
      this.logger.warn({ operation, maxRows: this.options.maxRows }, "Directory read truncated to row cap");
    }
    return parsed.data;
  }
}
