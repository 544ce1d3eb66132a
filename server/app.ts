import express from 'express';
import cors from 'cors';
import type { ServerConfig } from './config';
import { ConfigurationError, InternalInvariantViolation, SimulationCancelled } from '../src/engine/errors';
import { DEFAULT_DEGREES } from '../src/engine/degrees';
import {
  DEFAULT_ANNUAL_FEE_RATE,
  DEFAULT_HORIZON_YEARS,
  DEFAULT_PERFORMANCE_FEE,
  DEFAULT_YEARS_CAP,
  PROGRAM_PRESETS,
} from '../src/engine/scenarios';
import { simulateAsync } from '../src/engine/sim';
import { isSimulationRequest, validateSimulationRequest, type SimulationRequest } from '../src/types/schema';

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

// Maps an engine failure onto the HTTP response; unknown errors become a plain 500
export function errorResponse(error: unknown): ErrorResponse {
  if (error instanceof ConfigurationError) {
    return { status: 422, body: { error: 'Invalid configuration', issues: error.issues } };
  }
  if (error instanceof SimulationCancelled) {
    return { status: 499, body: { error: error.message, completedRuns: error.completedRuns } };
  }
  if (error instanceof InternalInvariantViolation) {
    return { status: 500, body: { error: 'Internal invariant violation', runIndex: error.runIndex, violations: error.violations } };
  }
  return { status: 500, body: { error: 'An error occurred while running the simulation.' } };
}

export function programCatalog() {
  return {
    defaults: {
      horizonYears: DEFAULT_HORIZON_YEARS,
      yearsCap: DEFAULT_YEARS_CAP,
      performanceFeePct: DEFAULT_PERFORMANCE_FEE,
      annualFeeRate: DEFAULT_ANNUAL_FEE_RATE,
    },
    programs: Object.values(PROGRAM_PRESETS).map((p) => ({
      programType: p.programType,
      description: p.description,
      isa: p.isa,
      scenarios: p.scenarios,
    })),
    degrees: Object.values(DEFAULT_DEGREES),
  };
}

export function createApp(config: ServerConfig) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/programs', (_req, res) => {
    res.json(programCatalog());
  });

  app.post('/api/simulate', async (req, res) => {
    const body: unknown = req.body;
    if (!isSimulationRequest(body)) {
      return res.status(400).json({ errors: validateSimulationRequest(body).errors });
    }
    const request: SimulationRequest = { ...body, seed: body.seed ?? config.defaultSeed };

    let disconnected = false;
    res.on('close', () => {
      if (!res.writableFinished) disconnected = true;
    });

    const started = Date.now();
    try {
      const result = await simulateAsync(request, {
        keepStudentSeries: config.maxSeriesRuns,
        shouldCancel: () => disconnected,
        onProgress: config.logRuns ? (done, total) => console.log(`simulate: run ${done}/${total}`) : undefined,
      });
      console.log(`simulate: ${result.summary.runs} runs in ${Date.now() - started}ms`);
      res.json(result);
    } catch (error) {
      if (error instanceof SimulationCancelled) {
        console.log(`simulate: client disconnected, ${error.message}`);
      } else if (error instanceof InternalInvariantViolation) {
        console.error('simulate: defect detected', error.violations);
      } else if (!(error instanceof ConfigurationError)) {
        console.error(error);
      }
      if (disconnected) return;
      const { status, body } = errorResponse(error);
      res.status(status).json(body);
    }
  });

  return app;
}
