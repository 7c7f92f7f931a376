import type { FastifyBaseLogger } from "fastify";

/** The slice of Fastify's pino logger the issuer services use. */
export type IssuerLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;
