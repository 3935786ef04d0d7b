import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import { ConfigurationError, describeError, FetchFailure, MalformedInputError } from "@imbalance-tracker/domain";
import { GenerationComparisonService } from "../generation/generation-comparison.service";
import { MonitorService } from "../polling/monitor.service";

export interface TrpcContext {
  monitorService: MonitorService;
}

const t = initTRPC.context<TrpcContext>().create();

const PROCEDURE_TYPES = ["query", "mutation", "subscription"] as const;
type ProcedureType = (typeof PROCEDURE_TYPES)[number];

const diffsInputSchema = z.object({limit: z.number().int().min(1).max(500).default(20)}).optional();
const compareInputSchema = z.object({date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/)});

function toTrpcError(error: unknown): TRPCError {
  if (error instanceof ConfigurationError) {
    return new TRPCError({code: "PRECONDITION_FAILED", message: error.message, cause: error});
  }
  if (error instanceof FetchFailure || error instanceof MalformedInputError) {
    return new TRPCError({code: "BAD_GATEWAY", message: error.message, cause: error});
  }
  return new TRPCError({code: "INTERNAL_SERVER_ERROR", message: describeError(error), cause: error});
}

function procedureTypeOf(procedure: unknown): ProcedureType | null {
  if (procedure === null || (typeof procedure !== "object" && typeof procedure !== "function")) {
    return null;
  }
  const def: unknown = Reflect.get(procedure, "_def");
  if (def === null || typeof def !== "object") {
    return null;
  }
  return PROCEDURE_TYPES.find((type) => Reflect.get(def, type) === true) ?? null;
}

function createAppRouter(monitorService: MonitorService, generationService: GenerationComparisonService) {
  return t.router({
    monitor: t.router({
      status: t.procedure.query(() => monitorService.status()),
      snapshot: t.procedure.query(() => monitorService.snapshot()),
      latestDiff: t.procedure.query(() => monitorService.latestDiff()),
      diffs: t.procedure
        .input(diffsInputSchema)
        .query(({input}) => monitorService.diffs(input?.limit ?? 20)),
    }),
    generation: t.router({
      compare: t.procedure
        .input(compareInputSchema)
        .query(async ({input}) => {
          try {
            return await generationService.compare(input.date);
          } catch (error) {
            throw toTrpcError(error);
          }
        }),
    }),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter;

  constructor(
    @Inject(MonitorService) monitorService: MonitorService,
    @Inject(GenerationComparisonService) generationService: GenerationComparisonService,
  ) {
    this.router = createAppRouter(monitorService, generationService);
  }

  listProcedures(): { path: string; type: ProcedureType }[] {
    const procedures: Record<string, unknown> = this.router._def.procedures;
    return Object.entries(procedures).flatMap(([path, procedure]) => {
      const type = procedureTypeOf(procedure);
      return type ? [{path, type}] : [];
    });
  }
}
