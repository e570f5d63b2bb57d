/**
 * Service principal provisioning through Microsoft Graph
 */

import { Client } from "@microsoft/microsoft-graph-client";
import type { TokenCredential } from "@azure/identity";
import { logger } from "../logging.js";
import { AuthenticationError, AzureAPIError } from "../errors.js";

const GRAPH_SCOPE = "https://graph.microsoft.com/.default";

export interface GraphApplication {
  id: string;
  appId: string;
  displayName: string;
}

export interface ServicePrincipalIdentity {
  displayName: string;
  appId: string;
  /** Object ID of the service principal (the principal role assignments target) */
  objectId: string;
  /** Object ID of the application registration (what gets deleted on cleanup) */
  applicationObjectId: string;
  clientSecret: string;
}

function readString(value: unknown, key: string): string | undefined {
  if (value && typeof value === "object" && key in value) {
    const field: unknown = Reflect.get(value, key);
    return typeof field === "string" ? field : undefined;
  }
  return undefined;
}

function toApplication(value: unknown): GraphApplication | undefined {
  const id = readString(value, "id");
  const appId = readString(value, "appId");
  const displayName = readString(value, "displayName");
  return id && appId && displayName ? { id, appId, displayName } : undefined;
}

function firstOfCollection(response: unknown): unknown {
  if (response && typeof response === "object" && "value" in response && Array.isArray(response.value)) {
    return response.value[0];
  }
  return undefined;
}

/**
 * Graph operations the suite needs, behind an interface so tests can stand one in.
 * The steps are separate so a caller can register the application for deletion
 * before anything else can fail.
 */
export interface ServicePrincipalDirectory {
  ensureApplication(displayName: string): Promise<{ application: GraphApplication; created: boolean }>;
  /** Object ID of the application's service principal, created when missing */
  ensureServicePrincipal(application: GraphApplication): Promise<string>;
  /** Secrets cannot be read back, so every run adds one */
  addSecret(application: GraphApplication, lifetimeHours: number): Promise<string>;
  deleteApplication(applicationObjectId: string): Promise<void>;
}

export class GraphServicePrincipalDirectory implements ServicePrincipalDirectory {
  constructor(private readonly client: Client) {}

  static fromCredential(credential: TokenCredential): GraphServicePrincipalDirectory {
    const client = Client.initWithMiddleware({
      authProvider: {
        getAccessToken: async () => {
          const token = await credential.getToken(GRAPH_SCOPE);
          if (!token) {
            throw new AuthenticationError("Failed to acquire a Microsoft Graph access token");
          }
          return token.token;
        },
      },
    });
    return new GraphServicePrincipalDirectory(client);
  }

  async findApplication(displayName: string): Promise<GraphApplication | undefined> {
    const escaped = displayName.replace(/'/g, "''");
    const response: unknown = await this.client
      .api("/applications")
      .filter(`displayName eq '${escaped}'`)
      .select("id,appId,displayName")
      .get();
    return toApplication(firstOfCollection(response));
  }

  async ensureApplication(displayName: string): Promise<{ application: GraphApplication; created: boolean }> {
    const existing = await this.findApplication(displayName);
    if (existing) {
      logger.info(`Reusing application registration ${displayName}`, { appId: existing.appId });
      return { application: existing, created: false };
    }

    const created: unknown = await this.client.api("/applications").post({ displayName });
    const application = toApplication(created);
    if (!application) {
      throw new AzureAPIError(`Graph returned an unexpected application for ${displayName}`, "GRAPH_UNEXPECTED_RESPONSE");
    }
    logger.info(`Created application registration ${displayName}`, { appId: application.appId });
    return { application, created: true };
  }

  async ensureServicePrincipal(application: GraphApplication): Promise<string> {
    const response: unknown = await this.client
      .api("/servicePrincipals")
      .filter(`appId eq '${application.appId}'`)
      .select("id,appId")
      .get();
    const existing = readString(firstOfCollection(response), "id");
    if (existing) {
      return existing;
    }

    const created: unknown = await this.client.api("/servicePrincipals").post({ appId: application.appId });
    const objectId = readString(created, "id");
    if (!objectId) {
      throw new AzureAPIError(`Graph returned no service principal ID for ${application.displayName}`, "GRAPH_UNEXPECTED_RESPONSE");
    }
    logger.info(`Created service principal for ${application.displayName}`);
    return objectId;
  }

  async addSecret(application: GraphApplication, lifetimeHours: number): Promise<string> {
    const endDateTime = new Date(Date.now() + lifetimeHours * 60 * 60 * 1000).toISOString();
    const password: unknown = await this.client
      .api(`/applications/${application.id}/addPassword`)
      .post({ passwordCredential: { displayName: "rbac-test-suite", endDateTime } });
    const clientSecret = readString(password, "secretText");
    if (!clientSecret) {
      throw new AzureAPIError(`Graph returned no secret for ${application.displayName}`, "GRAPH_UNEXPECTED_RESPONSE");
    }
    return clientSecret;
  }

  /** Deleting the registration removes its service principal with it */
  async deleteApplication(applicationObjectId: string): Promise<void> {
    await this.client.api(`/applications/${applicationObjectId}`).delete();
  }
}
