// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { toRunSummary } from "../presenters";

export const runsRouter = router({
  trigger: publicProcedure.mutation(async ({ ctx }) => {
    const outcome = await ctx.runner.trigger("manual");
    if (!outcome.accepted) {
      return {
        accepted: false as const,
        status: outcome.status,
        runId: outcome.runId,
        stage: outcome.stage,
      };
    }
    return { accepted: true as const, run: toRunSummary(outcome.result) };
  }),

  latest: publicProcedure.query(({ ctx }) => {
    const result = ctx.runner.getLastResult();
    return result ? toRunSummary(result) : null;
  }),
});
