#!/usr/bin/env node
import type { Pool } from "pg";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDb, createMemoryPool, createPgPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { LocalObjectStore } from "./artifacts/localObjectStore.js";
import { ArtifactService } from "./artifacts/artifactService.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PolicyEngine } from "./policy/policy.js";
import { PostgresStore } from "./store/postgresStore.js";

function createPool(): Pool {
  const url = process.env.DATABASE_URL;
  return url ? createPgPool(url) : createMemoryPool();
}

async function main(): Promise<void> {
  const policyPath = process.env.GATEWAY_POLICY_PATH ?? "policies/default.policy.yaml";
  const objectStoreDir = process.env.OBJECT_STORE_DIR ?? "var/objects";
  const runsDir = process.env.RUNS_DIR ?? "var/runs";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const policy = await PolicyEngine.loadFromFile(policyPath);
  if (process.env.DATABASE_URL) {
    const instanceId = policy.runtimeInstanceId();
    if (!instanceId) {
      throw new Error(`policy runtime.instance_id is required when DATABASE_URL is set (to avoid run_id collisions)`);
    }
  }
  const pool = createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool, "db/schema.sql");
  }

  const db = createDb(pool);
  const store = new PostgresStore(db);
  const objects = new LocalObjectStore(objectStoreDir);
  await objects.init();
  const artifacts = new ArtifactService(store, objects);

  const server = createGatewayServer({ policy, store, artifacts, runsDir });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("bsubgate gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
