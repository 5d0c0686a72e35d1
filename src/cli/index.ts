#!/usr/bin/env node
/**
 * Knowledge graph QA - CLI Entry Point
 *
 * - ask: Answer a question from the graph and the document index
 * - schema: Show the graph schema
 * - refresh-schema: Re-introspect the graph schema
 * - rebuild-index: Re-embed a semantic collection
 * - ingest: Classify a document and write it into the graph
 * - health: Health check
 * - samples: List example questions
 * - directory: Fixed reads over employees, projects, skills and departments
 */

import "dotenv/config";
import { Command } from "commander";
import { withDependencies } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { askCommand } from "./commands/ask-command.js";
import { schemaCommand } from "./commands/schema-command.js";
import { refreshSchemaCommand } from "./commands/refresh-schema-command.js";
import { rebuildIndexCommand } from "./commands/rebuild-index-command.js";
import { ingestCommand } from "./commands/ingest-command.js";
import { healthCommand } from "./commands/health-command.js";
import { samplesCommand } from "./commands/samples-command.js";
import {
  departmentsCommand,
  employeeProjectsCommand,
  employeesCommand,
  expertsCommand,
  projectsCommand,
  teamCommand,
} from "./commands/directory-command.js";
import {
  AskCommandOptionsSchema,
  DirectoryKeySchema,
  EmployeesCommandOptionsSchema,
  IngestCommandOptionsSchema,
  JsonOutputOptionsSchema,
  ProjectsCommandOptionsSchema,
  QuestionSchema,
  RebuildIndexCommandOptionsSchema,
  SamplesCommandOptionsSchema,
} from "./utils/validation.js";

const program = new Command();

program
  .name("kgqa")
  .description("Answer questions about a company knowledge graph, enriched with document search")
  .version("0.1.0");

// Ask command
program
  .command("ask")
  .description("Answer a natural-language question")
  .argument("<question>", "Question to answer")
  .option("-k, --k <number>", "Passages to retrieve (0 disables semantic retrieval)")
  .option("-c, --collection <name>", "Semantic collection to search")
  .option("--no-query", "Omit the generated query from the output")
  .option("--no-hints", "Do not pass passages to query generation")
  .option("--json", "Output as JSON")
  .action(async (question: string, options: Record<string, unknown>) => {
    try {
      const validatedQuestion = QuestionSchema.parse(question);
      const validatedOptions = AskCommandOptionsSchema.parse(options);
      await withDependencies((deps) => askCommand(validatedQuestion, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Schema command
program
  .command("schema")
  .description("Show node labels and relationship types with counts")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => schemaCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Refresh-schema command
program
  .command("refresh-schema")
  .description("Re-introspect the graph schema and rebuild the query generator")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => refreshSchemaCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Rebuild-index command
program
  .command("rebuild-index")
  .description("Re-embed a semantic collection from current graph contents")
  .argument("[collection]", "Collection to rebuild (default: documents)")
  .option("--json", "Output as JSON")
  .action(async (collection: string | undefined, options: Record<string, unknown>) => {
    try {
      const validatedOptions = RebuildIndexCommandOptionsSchema.parse({ ...options, collection });
      await withDependencies((deps) => rebuildIndexCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Ingest command
program
  .command("ingest")
  .description("Classify a text or markdown document and write it into the graph")
  .argument("<file>", "Path to a .txt or .md file")
  .option("-t, --type <type>", "Skip classification: contract, policy or general")
  .option("--title <title>", "Document title")
  .option("--client <name>", "Client the contract belongs to")
  .option("--departments <names>", "Comma-separated departments the policy applies to")
  .option("--json", "Output as JSON")
  .action(async (file: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = IngestCommandOptionsSchema.parse(options);
      await withDependencies((deps) => ingestCommand(file, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Health command
program
  .command("health")
  .description("Check health of all services")
  .action(async () => {
    try {
      const healthy = await withDependencies((deps) => healthCommand(deps), { connect: false });
      process.exitCode = healthy ? 0 : 1;
    } catch (error) {
      handleCommandError(error);
    }
  });

// Samples command
program
  .command("samples")
  .description("List example questions")
  .option("--category <name>", "Only questions of this category")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = SamplesCommandOptionsSchema.parse(options);
      await samplesCommand(validatedOptions);
    } catch (error) {
      handleCommandError(error);
    }
  });

// Directory commands
const directory = program.command("directory").description("Fixed reads over employees, projects and skills");

directory
  .command("employees")
  .description("List employees with their skills")
  .option("-d, --department <name>", "Only employees of this department")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = EmployeesCommandOptionsSchema.parse(options);
      await withDependencies((deps) => employeesCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

directory
  .command("projects")
  .description("List projects with team sizes")
  .option("-s, --status <status>", "Only projects with this status")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = ProjectsCommandOptionsSchema.parse(options);
      await withDependencies((deps) => projectsCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

directory
  .command("experts")
  .description("Employees holding a skill, most proficient first")
  .argument("<skill>", "Skill name")
  .option("--json", "Output as JSON")
  .action(async (skill: string, options: Record<string, unknown>) => {
    try {
      const validatedSkill = DirectoryKeySchema.parse(skill);
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => expertsCommand(validatedSkill, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

directory
  .command("departments")
  .description("Head count and active projects per department")
  .option("--json", "Output as JSON")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => departmentsCommand(validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

directory
  .command("employee-projects")
  .description("Projects an employee works on")
  .argument("<email>", "Employee email")
  .option("--json", "Output as JSON")
  .action(async (email: string, options: Record<string, unknown>) => {
    try {
      const validatedEmail = DirectoryKeySchema.parse(email);
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => employeeProjectsCommand(validatedEmail, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

directory
  .command("team")
  .description("Members of a project")
  .argument("<projectId>", "Project id")
  .option("--json", "Output as JSON")
  .action(async (projectId: string, options: Record<string, unknown>) => {
    try {
      const validatedId = DirectoryKeySchema.parse(projectId);
      const validatedOptions = JsonOutputOptionsSchema.parse(options);
      await withDependencies((deps) => teamCommand(validatedId, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

program.parseAsync().catch((error: unknown) => handleCommandError(error));
