/**
 * Health Command - Check service health status
 *
 * Verifies that all required services are operational.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import { toError } from "../../utils/retry.js";

/**
 * Health check result for a single service
 */
export interface HealthCheckResult {
  name: string;
  healthy: boolean;
  durationMs: number;
  error?: string;
}

async function check(name: string, ping: () => Promise<boolean>): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    const healthy = await ping();
    return { name, healthy, durationMs: performance.now() - start };
  } catch (error) {
    return { name, healthy: false, durationMs: performance.now() - start, error: toError(error).message };
  }
}

/**
 * Check every dependency. Expects unconnected dependencies and connects
 * each one itself so a single outage does not hide the others.
 *
 * @returns whether every service is healthy
 */
export async function healthCommand(deps: CliDependencies): Promise<boolean> {
  console.log(chalk.bold("\nHealth Check Results\n"));

  const results: HealthCheckResult[] = [
    await check("Neo4j", async () => {
      await deps.store.connect();
      return deps.store.healthCheck();
    }),
    await check("ChromaDB", async () => {
      await deps.vectorIndex.connect();
      return deps.vectorIndex.healthCheck();
    }),
    await check(`Embeddings (${deps.embeddings.providerId})`, () => deps.embeddings.healthCheck()),
    await check(`Language model (${deps.llm.providerId})`, () => deps.llm.healthCheck()),
  ];

  for (const result of results) {
    const status = result.healthy ? chalk.green("✓") : chalk.red("✗");
    const duration = chalk.gray(`(${Math.round(result.durationMs)}ms)`);
    const healthStatus = result.healthy ? chalk.green("healthy") : chalk.red("unhealthy");

    console.log(`${status} ${result.name.padEnd(28)} ${healthStatus.padEnd(20)} ${duration}`);

    if (result.error) {
      console.log(chalk.gray(`  Error: ${result.error}`));
    }
  }

  const allHealthy = results.every((r) => r.healthy);
  console.log();

  if (allHealthy) {
    console.log(chalk.green("✓ All systems operational."));
  } else {
    console.log(chalk.red("✗ Some systems are unhealthy."));
    console.log("\n" + chalk.bold("Next steps:"));
    console.log("  • Verify the databases are running: " + chalk.gray("docker compose up -d"));
    console.log("  • Check NEO4J_PASSWORD, CHROMADB_HOST and CHROMADB_PORT in .env");
    console.log("  • Check OPENAI_API_KEY (and GROQ_API_KEY when LLM_PROVIDER=groq) in .env");
  }
  return allHealthy;
}
