import type { Router } from "express";
import { getUserId } from "../context/user-context.js";
import { asyncRoute } from "../helpers/http-response.js";
import { parseBody } from "../helpers/parse-helpers.js";
import { getToday, proteinUpdateSchema, updateProtein } from "../helpers/protein-helpers.js";

export function registerProteinRoutes(router: Router) {
  router.get("/protein", asyncRoute(async (_req, res) => {
    res.json(await getToday(getUserId()));
  }));

  router.patch("/protein", asyncRoute(async (req, res) => {
    const update = parseBody(proteinUpdateSchema, req.body);
    res.json(await updateProtein(getUserId(), update));
  }));
}
