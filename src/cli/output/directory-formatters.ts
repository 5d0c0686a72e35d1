/**
 * Directory Formatters - Tables for the company directory reads
 */

import Table from "cli-table3";
import chalk from "chalk";
import type {
  DepartmentStats,
  EmployeeProjects,
  EmployeeSummary,
  ProjectSummary,
  ProjectTeam,
  SkillExperts,
} from "../../graph/company-directory.js";
import { tableStyle, truncate } from "./formatters.js";

function orDash(value: string | number | null): string {
  return value === null ? chalk.gray("-") : String(value);
}

function headers(...names: string[]): string[] {
  return names.map((name) => chalk.cyan(name));
}

export function createEmployeesTable(employees: readonly EmployeeSummary[]): string {
  if (employees.length === 0) {
    return chalk.yellow("No employees found.");
  }
  const table = new Table({ head: headers("Name", "Title", "Department", "Email", "Skills"), style: tableStyle() });
  for (const e of employees) {
    table.push([e.name, orDash(e.title), e.department, orDash(e.email), truncate(e.skills.join(", "), 40)]);
  }
  return table.toString();
}

export function createProjectsTable(projects: readonly ProjectSummary[]): string {
  if (projects.length === 0) {
    return chalk.yellow("No projects found.");
  }
  const table = new Table({
    head: headers("Id", "Name", "Status", "Team", "Description"),
    colAligns: ["left", "left", "left", "right", "left"],
    style: tableStyle(),
  });
  for (const p of projects) {
    table.push([p.projectId, p.name, orDash(p.status), p.teamSize.toString(), truncate(p.description ?? "", 50)]);
  }
  return table.toString();
}

export function createExpertsTable(result: SkillExperts): string {
  const table = new Table({
    head: headers("Name", "Title", "Department", "Proficiency", "Years"),
    colAligns: ["left", "left", "left", "left", "right"],
    style: tableStyle(),
  });
  for (const e of result.experts) {
    table.push([e.name, orDash(e.title), e.department, orDash(e.proficiency), orDash(e.yearsExperience)]);
  }
  return [chalk.bold(`\nExperts in ${result.skill}`), table.toString()].join("\n");
}

export function createDepartmentStatsTable(stats: readonly DepartmentStats[]): string {
  if (stats.length === 0) {
    return chalk.yellow("No departments found.");
  }
  const table = new Table({
    head: headers("Department", "Employees", "Active projects"),
    colAligns: ["left", "right", "right"],
    style: tableStyle(),
  });
  for (const s of stats) {
    table.push([s.department, s.employeeCount.toString(), s.activeProjects.toString()]);
  }
  return table.toString();
}

export function createEmployeeProjectsTable(result: EmployeeProjects): string {
  const table = new Table({
    head: headers("Id", "Project", "Status", "Role", "Hours/week"),
    colAligns: ["left", "left", "left", "left", "right"],
    style: tableStyle(),
  });
  for (const p of result.projects) {
    table.push([p.projectId, p.name, orDash(p.status), orDash(p.role), orDash(p.hoursPerWeek)]);
  }
  return [chalk.bold(`\nProjects of ${result.email}`), table.toString()].join("\n");
}

export function createProjectTeamTable(result: ProjectTeam): string {
  const heading =
    chalk.bold(`\n${result.projectName}`) + chalk.gray(` (${result.projectId}, ${result.status ?? "no status"})`);
  if (result.team.length === 0) {
    return [heading, chalk.yellow("No team members.")].join("\n");
  }
  const table = new Table({ head: headers("Name", "Role", "Title", "Department", "Email"), style: tableStyle() });
  for (const m of result.team) {
    table.push([m.name, orDash(m.projectRole), orDash(m.title), orDash(m.department), orDash(m.email)]);
  }
  return [heading, table.toString()].join("\n");
}
