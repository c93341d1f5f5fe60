import { Test, TestingModule } from "@nestjs/testing";
import { INestApplication } from "@nestjs/common";
import { HttpService } from "@nestjs/axios";
import { of } from "rxjs";
import { AppModule } from "../../src/app.module";
import { TEST_CONFIG } from "../fixtures/test-config";
import {
  createAxiosResponse,
  createMockSendMessageResponse,
} from "../fixtures/mock-responses";

const NOTIFIER_ENV_KEYS = [
  "MS_TOKEN",
  "MS_BASIC_TOKEN",
  "MS_API_URL",
  "TG_BOT_TOKEN",
  "TG_CHAT_ID",
  "TG_API_URL",
  "HTTP_TIMEOUT_MS",
  "PORT",
] as const;

export type NotifierEnv = Partial<
  Record<(typeof NOTIFIER_ENV_KEYS)[number], string>
>;

export const DEFAULT_TEST_ENV: NotifierEnv = {
  MS_TOKEN: TEST_CONFIG.moysklad.token,
  TG_BOT_TOKEN: TEST_CONFIG.telegram.bot_token,
  TG_CHAT_ID: TEST_CONFIG.telegram.chat_id,
  HTTP_TIMEOUT_MS: String(TEST_CONFIG.http.timeout_ms),
};

// One mock stands in for every HttpService instance (MoySklad and Telegram)
export const httpServiceMock = {
  get: jest.fn(),
  post: jest.fn(),
};

/**
 * Replace the notifier variables of process.env with `env`
 */
export function applyNotifierEnv(env: NotifierEnv): void {
  for (const key of NOTIFIER_ENV_KEYS) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

export async function createTestingModule(
  env: NotifierEnv = DEFAULT_TEST_ENV,
): Promise<TestingModule> {
  applyNotifierEnv(env);

  return Test.createTestingModule({
    imports: [AppModule],
  })
    // Critical: prevents real HTTP calls to MoySklad and Telegram
    .overrideProvider(HttpService)
    .useValue(httpServiceMock)
    .compile();
}

export async function createTestApp(
  env: NotifierEnv = DEFAULT_TEST_ENV,
): Promise<INestApplication> {
  const moduleFixture = await createTestingModule(env);

  const app = moduleFixture.createNestApplication({ logger: false });
  await app.init();

  return app;
}

/**
 * Reset HttpService mocks between tests
 *
 * GET answers with an empty body and POST with a successful sendMessage
 * response unless a test queues its own values.
 */
export function resetMocks(): void {
  httpServiceMock.get.mockReset();
  httpServiceMock.post.mockReset();

  httpServiceMock.get.mockReturnValue(of(createAxiosResponse({})));
  httpServiceMock.post.mockReturnValue(
    of(createAxiosResponse(createMockSendMessageResponse())),
  );
}
