import type { IssuerAuthority } from "../authority/issuer-authority.js";
import type { CredentialRegistry } from "../registry/credential-registry.js";
import type { MintOrchestrator } from "../mint/orchestrator.js";
import type { EventLog } from "../event-log/writer.js";
import type { AuthOptions } from "../auth.js";

/** Everything a route handler may touch. */
export interface RouteContext {
  authority: IssuerAuthority;
  registry: CredentialRegistry;
  orchestrator: MintOrchestrator;
  events: EventLog;
  auth: AuthOptions;
}
