import { Router, type Request, type Response, type NextFunction } from 'express';
import { PlanRequestSchema } from '../types';
import { profileFromRequest } from '../data/profile';
import { planForProfile, type PlannerDependencies } from '../services/planner';
import { formatPlanJson } from '../services/output/formatters';
import { todayInTimeZone } from '../utils/dates';

export interface PlanRouteOptions {
  planner: PlannerDependencies;
  timeZone: string;
}

export function createPlanRoutes({ planner, timeZone }: PlanRouteOptions): Router {
  const router = Router();

  // POST /v1/plan - Plan breakfast, lunch and dinner for one day
  // An aborted plan is still a 200: the body carries status "aborted" and the reason
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = PlanRequestSchema.parse(req.body);
      const profile = profileFromRequest(data);
      const date = data.date ?? todayInTimeZone(timeZone);

      const result = planForProfile(planner, profile, { date });
      if (result.status === 'aborted') {
        console.log(`[Planner] Aborted at ${result.abortedAt}: ${result.warnings.join('; ')}`);
      } else {
        const picks = result.dailyPlan.meals.map((m) => `${m.mealType}=${m.recipe.id}`).join(', ');
        console.log(`[Planner] Planned ${date}: ${picks} (meets goals: ${result.success})`);
      }

      res.status(200).json(formatPlanJson(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
