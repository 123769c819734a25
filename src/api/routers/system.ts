// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { describeStatus } from "../presenters";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => describeStatus(ctx)),
});
