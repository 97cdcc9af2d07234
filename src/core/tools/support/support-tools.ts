import type { ToolDefinition } from "../../types";
import type { SupportDataSource } from "./support-data.source";

export const SUPPORT_TOOL_NAMES = [
  "get_customer_overview",
  "get_recent_operations",
  "get_active_incidents",
] as const;

const DEFAULT_OPERATIONS_LIMIT = 10;

const requireSource = (source: SupportDataSource | undefined): SupportDataSource => {
  if (!source) {
    throw new Error("The support data backend is not configured");
  }
  return source;
};

const asJson = (payload: unknown): string => JSON.stringify(payload, null, 2);

/**
 * Support lookups exposed to agents. The tools are always registered so that
 * agent descriptors validate; without a data source every call fails with an
 * error result.
 */
export function createSupportTools(source: SupportDataSource | undefined): ToolDefinition[] {
  return [
    {
      name: "get_customer_overview",
      description:
        "Fetch a customer's profile, merchant record, account status and authentication status.",
      jsonSchema: {
        type: "object",
        properties: {
          user_id: { type: "string", minLength: 1 },
        },
        required: ["user_id"],
        additionalProperties: false,
      },
      async handler(args) {
        const userId = String(args.user_id);
        const overview = await requireSource(source).getCustomerOverview(userId);
        if (!overview.user) {
          return {
            content: asJson({ ...overview, message: `No user found for user_id '${userId}'` }),
            data: overview,
          };
        }
        return { content: asJson(overview), data: overview };
      },
    },
    {
      name: "get_recent_operations",
      description: "List a customer's most recent transfers and devices.",
      jsonSchema: {
        type: "object",
        properties: {
          user_id: { type: "string", minLength: 1 },
          limit: {
            type: "integer",
            minimum: 1,
            maximum: 100,
            default: DEFAULT_OPERATIONS_LIMIT,
          },
        },
        required: ["user_id"],
        additionalProperties: false,
      },
      async handler(args) {
        const userId = String(args.user_id);
        const limit = typeof args.limit === "number" ? args.limit : DEFAULT_OPERATIONS_LIMIT;
        const operations = await requireSource(source).getRecentOperations(userId, limit);
        if (!operations.merchant_id) {
          return {
            content: asJson({
              transfers: [],
              devices: [],
              message: `No merchant found for user_id '${userId}'`,
            }),
            data: operations,
          };
        }
        return {
          content: asJson({ transfers: operations.transfers, devices: operations.devices }),
          data: operations,
        };
      },
    },
    {
      name: "get_active_incidents",
      description: "List service incidents that are currently active, newest first.",
      jsonSchema: {
        type: "object",
        properties: {},
        additionalProperties: false,
      },
      async handler() {
        const incidents = await requireSource(source).getActiveIncidents();
        return { content: asJson({ incidents }), data: { incidents } };
      },
    },
  ];
}
