import swaggerJsdoc from "swagger-jsdoc";
import { config } from "../config";

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: "3.0.0",
        info: {
            title: "Tenant Playback Orchestrator API",
            version: "1.0.0",
            description:
                "Per-tenant playback queues: enqueue, control and status for each tenant's audio output",
        },
        servers: [
            {
                url: `http://localhost:${config.port}`,
                description: "Development server",
            },
        ],
        components: {
            securitySchemes: {
                gatewayToken: {
                    type: "apiKey",
                    in: "header",
                    name: "X-Gateway-Token",
                    description: "Shared secret the audio gateway sends with completion callbacks",
                },
            },
            schemas: {
                StatusSnapshot: {
                    type: "object",
                    properties: {
                        tenantId: { type: "string" },
                        state: {
                            type: "string",
                            enum: ["idle", "resolving", "playing", "paused"],
                        },
                        isPlaying: { type: "boolean" },
                        title: { type: "string", nullable: true },
                        pendingTitle: { type: "string", nullable: true },
                        thumbnailUrl: { type: "string", nullable: true },
                        pageUrl: { type: "string", nullable: true },
                        elapsedSeconds: { type: "number" },
                        durationSeconds: { type: "number" },
                        progressFraction: { type: "number", nullable: true },
                        progressBar: { type: "string" },
                        elapsedLabel: { type: "string" },
                        totalLabel: { type: "string" },
                        queuePreview: { type: "array", items: { type: "string" } },
                        queueRemainingCount: { type: "integer" },
                        queueLength: { type: "integer" },
                        version: { type: "integer" },
                        capturedAt: { type: "integer" },
                    },
                },
                SearchResult: {
                    type: "object",
                    properties: {
                        title: { type: "string" },
                        reference: { type: "string", nullable: true },
                        durationSeconds: { type: "number" },
                        durationLabel: { type: "string", nullable: true },
                        thumbnailUrl: { type: "string", nullable: true },
                        uploader: { type: "string", nullable: true },
                    },
                },
                Error: {
                    type: "object",
                    properties: {
                        error: { type: "string" },
                        code: { type: "string" },
                    },
                },
            },
        },
        tags: [
            { name: "Playback", description: "Queue and playback control per tenant" },
            { name: "Driver", description: "Callbacks from the audio gateway" },
        ],
    },
    apis: ["./src/routes/*.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
