import express from "express";
import { z } from "zod";
import { scanProgram } from "../analysis/reentrancyScanner";
import { loadConfig } from "../config";
import { parseProgram } from "../services/programLoader";
import { InvariantViolationError, ProgramLoadError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("server");

const AnalyzeBodySchema = z.object({
  program: z.unknown(),
  function: z.string().optional()
});

const app = express();
app.use(express.json({ limit: "5mb" }));

app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.post("/analyze", (req, res) => {
  const parsed = AnalyzeBodySchema.safeParse(req.body);
  if (!parsed.success || parsed.data.program === undefined) {
    res.status(400).json({ error: "Invalid request body", details: parsed.success ? undefined : parsed.error.flatten() });
    return;
  }

  try {
    const program = parseProgram(parsed.data.program);
    res.json(scanProgram(program, { functionFilter: parsed.data.function }));
  } catch (err) {
    if (err instanceof ProgramLoadError || err instanceof InvariantViolationError) {
      res.status(422).json({ error: err.message, code: err.code });
      return;
    }
    log.error({ err }, "analysis failed");
    res.status(500).json({ error: "Analysis failed" });
  }
});

if (require.main === module) {
  const { PORT } = loadConfig();
  app.listen(PORT, () => {
    log.info({ port: PORT }, "Sierra reentrancy scanner API listening");
  });
}

export default app;
