import request from "supertest";
import { INestApplication } from "@nestjs/common";
import { createTestApp, resetMocks } from "../utils/test-app.factory";

describe("Health E2E Tests", () => {
  let app: INestApplication;
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(async () => {
    originalEnv = { ...process.env };
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
    process.env = originalEnv;
  });

  beforeEach(() => {
    resetMocks();
  });

  it("GET /health should report ok", async () => {
    const response = await request(app.getHttpServer()).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: "ok",
      info: {},
      error: {},
      details: {},
    });
  });
});
