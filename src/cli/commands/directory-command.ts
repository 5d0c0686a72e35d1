/**
 * Directory Commands - Fixed reads over employees, projects and skills
 *
 * - employees: List employees, optionally in one department
 * - projects: List projects with team sizes
 * - experts: Employees holding a skill
 * - departments: Head count and active projects per department
 * - employee-projects: Projects one employee works on
 * - team: Members of one project
 */

/* eslint-disable no-console */

import type { CliDependencies } from "../utils/dependency-init.js";
import type { EmployeesCommandOptions, JsonOutputOptions, ProjectsCommandOptions } from "../utils/validation.js";
import { formatJson } from "../output/formatters.js";
import {
  createDepartmentStatsTable,
  createEmployeeProjectsTable,
  createEmployeesTable,
  createExpertsTable,
  createProjectTeamTable,
  createProjectsTable,
} from "../output/directory-formatters.js";

export async function employeesCommand(options: EmployeesCommandOptions, deps: CliDependencies): Promise<void> {
  const employees = await deps.directory.listEmployees({ department: options.department });
  console.log(options.json ? formatJson(employees) : createEmployeesTable(employees));
}

export async function projectsCommand(options: ProjectsCommandOptions, deps: CliDependencies): Promise<void> {
  const projects = await deps.directory.listProjects({ status: options.status });
  console.log(options.json ? formatJson(projects) : createProjectsTable(projects));
}

export async function expertsCommand(skill: string, options: JsonOutputOptions, deps: CliDependencies): Promise<void> {
  const result = await deps.directory.findSkillExperts(skill);
  console.log(options.json ? formatJson(result) : createExpertsTable(result));
}

export async function departmentsCommand(options: JsonOutputOptions, deps: CliDependencies): Promise<void> {
  const stats = await deps.directory.departmentStats();
  console.log(options.json ? formatJson(stats) : createDepartmentStatsTable(stats));
}

export async function employeeProjectsCommand(
  email: string,
  options: JsonOutputOptions,
  deps: CliDependencies
): Promise<void> {
  const result = await deps.directory.employeeProjects(email);
  console.log(options.json ? formatJson(result) : createEmployeeProjectsTable(result));
}

export async function teamCommand(projectId: string, options: JsonOutputOptions, deps: CliDependencies): Promise<void> {
  const result = await deps.directory.projectTeam(projectId);
  console.log(options.json ? formatJson(result) : createProjectTeamTable(result));
}
