import fetch from "node-fetch";
import https from "https";
import { LoggerService } from "@backstage/backend-plugin-api";
import { GardenerConnectionConfig } from "./config";
import {
  GARDENER_API_GROUP,
  GARDENER_API_VERSION,
  SHOOT_PLURAL,
} from "./constants";
import { GardenerApiError, NotFoundError } from "./errors";
import { KubeconfigProvider } from "./kubeconfig/reconciler";
import { shootNamespace } from "./shoot/extenders";

export interface AdminKubeconfigProviderOptions {
  gardener: GardenerConnectionConfig;
  expirationSeconds: number;
  logger: LoggerService;
  /** Request timeout in milliseconds. */
  timeout?: number;
}

interface AdminKubeconfigResponse {
  status?: {
    kubeconfig?: string;
    expirationTimestamp?: string;
  };
}

/**
 * Requests short-lived admin kubeconfigs through the Shoot's
 * `adminkubeconfig` subresource.
 */
export class AdminKubeconfigProvider implements KubeconfigProvider {
  private readonly gardener: GardenerConnectionConfig;
  private readonly expirationSeconds: number;
  private readonly logger: LoggerService;
  private readonly timeout: number;
  private readonly agent?: https.Agent;

  constructor(options: AdminKubeconfigProviderOptions) {
    this.gardener = options.gardener;
    this.expirationSeconds = options.expirationSeconds;
    this.logger = options.logger;
    this.timeout = options.timeout ?? 30_000;
    this.agent = options.gardener.url.startsWith("https:")
      ? this.buildAgent(options.gardener.caData)
      : undefined;
  }

  async fetch(shootName: string): Promise<string> {
    const namespace = shootNamespace(this.gardener.projectName);
    const url = `${this.gardener.url.replace(/\/$/, "")}/apis/${GARDENER_API_GROUP}/${GARDENER_API_VERSION}/namespaces/${namespace}/${SHOOT_PLURAL}/${shootName}/adminkubeconfig`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    if (this.gardener.token) {
      headers.Authorization = `Bearer ${this.gardener.token}`;
    }

    const res = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify({
        apiVersion: "authentication.gardener.cloud/v1alpha1",
        kind: "AdminKubeconfigRequest",
        spec: { expirationSeconds: this.expirationSeconds },
      }),
      agent: this.agent,
      timeout: this.timeout,
    });

    if (!res.ok) {
      const text = await res.text();
      const message = `Failed to issue admin kubeconfig for shoot ${namespace}/${shootName}: ${res.status} ${res.statusText} ${text}`.trim();
      this.logger.debug(message);
      if (res.status === 404) {
        throw new NotFoundError(message);
      }
      throw new GardenerApiError(message, res.status);
    }

    const data = (await res.json()) as AdminKubeconfigResponse;
    const encoded = data.status?.kubeconfig;
    if (!encoded) {
      throw new GardenerApiError(
        `Admin kubeconfig response for shoot ${namespace}/${shootName} carries no kubeconfig`,
      );
    }
    return Buffer.from(encoded, "base64").toString("utf8");
  }

  private buildAgent(caData?: string): https.Agent {
    const agentOptions: https.AgentOptions = {
      rejectUnauthorized: this.gardener.skipTLSVerify ? false : true,
    };
    if (caData) {
      agentOptions.ca = Buffer.from(caData, "base64");
    }
    return new https.Agent(agentOptions);
  }
}
