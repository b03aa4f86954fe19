import { WELLNESS_INTENTS } from "../agents/types.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

const errorSchema = {
  type: "object",
  required: ["error", "message", "timestamp"],
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    details: {
      type: "array",
      items: {
        type: "object",
        properties: { field: { type: "string" }, message: { type: "string" } }
      }
    },
    timestamp: { type: "string", format: "date-time" }
  }
};

export const openApiDocument = {
  openapi: "3.0.3",
  info: {
    title: SERVICE_NAME,
    version: SERVICE_VERSION,
    description:
      "Multi-agent wellness guidance. A question is classified into an intent, answered by one or more LLM-backed specialists and " +
      "synthesized into a single response. Emergency language returns a safety alert instead. Responses are educational, not medical advice."
  },
  paths: {
    "/": {
      get: { summary: "Welcome message and endpoint map", responses: { "200": { description: "Service information" } } }
    },
    "/health": {
      get: {
        summary: "Liveness probe",
        responses: {
          "200": {
            description: "Service is healthy",
            content: { "application/json": { schema: { $ref: "#/components/schemas/Health" } } }
          }
        }
      }
    },
    "/wellness/query": {
      post: {
        summary: "Ask a wellness question",
        requestBody: {
          required: true,
          content: { "application/json": { schema: { $ref: "#/components/schemas/QueryRequest" } } }
        },
        responses: {
          "200": {
            description: "Synthesized guidance, or a safety alert when requires_emergency is true",
            content: { "application/json": { schema: { $ref: "#/components/schemas/QueryResponse" } } }
          },
          "400": {
            description: "Invalid request body",
            content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } }
          }
        }
      }
    },
    "/wellness/intents": {
      get: { summary: "Supported intents", responses: { "200": { description: "Intent labels" } } }
    },
    "/wellness/memory/{userId}": {
      parameters: [{ name: "userId", in: "path", required: true, schema: { type: "string" } }],
      get: {
        summary: "Conversation memory statistics for a user",
        responses: {
          "200": { description: "Memory statistics" },
          "404": {
            description: "No memory for this user",
            content: { "application/json": { schema: { $ref: "#/components/schemas/Error" } } }
          }
        }
      },
      delete: { summary: "Forget a user's conversation", responses: { "204": { description: "Memory cleared" } } }
    }
  },
  components: {
    schemas: {
      Health: {
        type: "object",
        properties: {
          status: { type: "string", example: "healthy" },
          version: { type: "string" },
          agents_available: { type: "integer" },
          uptime: { type: "number" },
          timestamp: { type: "string", format: "date-time" }
        }
      },
      QueryRequest: {
        type: "object",
        required: ["user_id", "query"],
        properties: {
          user_id: { type: "string", minLength: 1 },
          query: { type: "string", minLength: 1, maxLength: 2000, example: "I feel tired all the time" },
          intent: { type: "string", enum: [...WELLNESS_INTENTS] }
        }
      },
      AgentResponse: {
        type: "object",
        properties: {
          agent_name: { type: "string" },
          content: { type: "string" },
          confidence: { type: "number" },
          recommendations: { type: "array", items: { type: "string" } }
        }
      },
      QueryResponse: {
        type: "object",
        required: [
          "user_id",
          "query",
          "intent",
          "synthesized_guidance",
          "primary_recommendations",
          "agent_count",
          "requires_emergency"
        ],
        properties: {
          user_id: { type: "string" },
          query: { type: "string" },
          intent: { type: "string", enum: [...WELLNESS_INTENTS, "emergency"] },
          intent_source: { type: "string", enum: ["request", "model", "keywords", "safety"] },
          agent_responses: { type: "array", items: { $ref: "#/components/schemas/AgentResponse" } },
          synthesized_guidance: { type: "string" },
          primary_recommendations: { type: "array", items: { type: "string" } },
          agent_count: { type: "integer" },
          disclaimer: { type: "string" },
          warning: { type: "string" },
          requires_emergency: { type: "boolean" },
          safety_category: { type: "string", enum: ["mental_health", "medical"] }
        }
      },
      Error: errorSchema
    }
  }
};

export const swaggerUiHtml = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${SERVICE_NAME} - API docs</title>
    <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css" />
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
    <script>
      window.onload = function () {
        window.ui = SwaggerUIBundle({ url: "/docs/openapi.json", dom_id: "#swagger-ui" });
      };
    </script>
  </body>
</html>
`;
