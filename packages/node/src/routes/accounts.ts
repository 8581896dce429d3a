/**
 * Account routes.
 *
 * GET    /api/v1/accounts               — List accounts
 * POST   /api/v1/accounts               — Create an account
 * GET    /api/v1/accounts/:id           — Get a single account
 * POST   /api/v1/accounts/:id/deposit   — Add to the balance
 * POST   /api/v1/accounts/:id/withdraw  — Take from the balance
 * DELETE /api/v1/accounts/:id           — Close an account
 *
 * Handlers only throw; the global error handler renders every failure.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountSchema, CreateAccountSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import type { AccountStore } from "../services/account-store.js";

export function createAccountRoutes(store: AccountStore): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: store.list() });
  });

  routes.post("/", async (c) => {
    const body = await parseBody(c, CreateAccountSchema);
    const account = store.create(body);
    return c.json({ data: account }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: store.get(c.req.param("id")) });
  });

  routes.post("/:id/deposit", async (c) => {
    const { amount } = await parseBody(c, AmountSchema);
    return c.json({ data: store.deposit(c.req.param("id"), amount) });
  });

  routes.post("/:id/withdraw", async (c) => {
    const { amount } = await parseBody(c, AmountSchema);
    return c.json({ data: store.withdraw(c.req.param("id"), amount) });
  });

  routes.delete("/:id", (c) => {
    store.delete(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
