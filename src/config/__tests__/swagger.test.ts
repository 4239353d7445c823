describe("config/swagger", () => {
    beforeEach(() => {
        jest.resetModules();
    });

    test("builds swagger options from config and exports generated spec", async () => {
        const mockedSpec = { mocked: "swagger-spec" };
        const swaggerJsdoc = jest.fn(() => mockedSpec);

        jest.doMock("swagger-jsdoc", () => swaggerJsdoc);
        jest.doMock("../../config", () => ({
            config: {
                port: 9876,
            },
        }));

        const { swaggerSpec } = await import("../swagger");

        expect(swaggerJsdoc).toHaveBeenCalledTimes(1);
        expect(swaggerJsdoc).toHaveBeenCalledWith(
            expect.objectContaining({
                definition: expect.objectContaining({
                    openapi: "3.0.0",
                    servers: [
                        expect.objectContaining({
                            url: "http://localhost:9876",
                        }),
                    ],
                    components: expect.objectContaining({
                        securitySchemes: {
                            gatewayToken: expect.objectContaining({
                                type: "apiKey",
                                in: "header",
                                name: "X-Gateway-Token",
                            }),
                        },
                    }),
                }),
                apis: ["./src/routes/*.ts"],
            })
        );
        expect(swaggerSpec).toBe(mockedSpec);
    });
});
