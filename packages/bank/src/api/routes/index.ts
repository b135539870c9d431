import type { Route } from "@clearline/core/http";
import type { Bank } from "../../bank/base.js";
import { accountRoutes } from "./account-routes.js";
import { instanceRoutes, protocolRoutes } from "./protocol-routes.js";
import { transferRoutes } from "./transfer-routes.js";

export const routes: Route<Bank>[] = [...instanceRoutes, ...accountRoutes, ...transferRoutes, ...protocolRoutes];
