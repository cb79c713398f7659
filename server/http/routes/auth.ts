import type { Express } from "express";
import { nanoid } from "nanoid";

import type { CredentialService } from "../../auth/credentials.js";
import { EmailTakenError, InvalidCredentialsError, UnauthorizedError } from "../../errors.js";
import type { RecordStore } from "../../storage/contracts.js";
import type { UserRecord } from "../../types/contracts.js";
import { requireRequestUserId, sendRouteError } from "./helpers.js";
import { loginSchema, registerUserSchema } from "./schemas.js";

export interface AuthRouteDependencies {
  store: RecordStore;
  credentials: CredentialService;
}

function serializeUser(user: UserRecord) {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    created_at: user.createdAt,
    is_active: user.isActive
  };
}

function tokenResponse(credentials: CredentialService, user: UserRecord) {
  return {
    access_token: credentials.issueToken(user.id),
    token_type: "bearer",
    user: serializeUser(user)
  };
}

export function registerAuthRoutes(app: Express, deps: AuthRouteDependencies): void {
  app.post("/api/auth/register", async (request, response) => {
    try {
      const input = registerUserSchema.parse(request.body ?? {});
      const existing = await deps.store.users.findByEmail(input.email);
      if (existing) {
        throw new EmailTakenError();
      }

      const user = await deps.store.users.create({
        id: nanoid(),
        email: input.email.toLowerCase(),
        name: input.name,
        hashedPassword: await deps.credentials.hashPassword(input.password),
        createdAt: new Date().toISOString(),
        isActive: true
      });

      response.status(201).json(tokenResponse(deps.credentials, user));
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/auth/login", async (request, response) => {
    try {
      const input = loginSchema.parse(request.body ?? {});
      const user = await deps.store.users.findByEmail(input.email);
      if (!user || !user.isActive || !(await deps.credentials.verifyPassword(input.password, user.hashedPassword))) {
        throw new InvalidCredentialsError();
      }

      response.json(tokenResponse(deps.credentials, user));
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/auth/me", async (_request, response) => {
    try {
      const userId = requireRequestUserId(response);
      const user = await deps.store.users.findById(userId);
      if (!user || !user.isActive) {
        throw new UnauthorizedError("Account is no longer available.");
      }

      response.json(serializeUser(user));
    } catch (error) {
      sendRouteError(error, response);
    }
  });
}
