import { Hono } from "hono";
import type { KnowledgeStore } from "../services/knowledge-store.ts";

/**
 * GET /api/v1/scenarios - Historical stress scenarios the engine reasons with
 */
export function createScenarioRoutes(knowledge: KnowledgeStore) {
  const scenarioRoutes = new Hono();

  scenarioRoutes.get("/", async (c) => {
    const scenarios = await knowledge.listScenarios();
    return c.json({ count: scenarios.length, scenarios });
  });

  return scenarioRoutes;
}
