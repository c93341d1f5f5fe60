import { CallHandler, Logger } from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { lastValueFrom, of, throwError } from "rxjs";
import { LoggingInterceptor } from "./logging.interceptor";

describe("LoggingInterceptor", () => {
  let interceptor: LoggingInterceptor;
  let debugSpy: jest.SpyInstance;

  const context = new ExecutionContextHost([
    { method: "POST", url: "/webhook/moysklad" },
    { statusCode: 200 },
  ]);

  beforeEach(() => {
    interceptor = new LoggingInterceptor();
    debugSpy = jest
      .spyOn(Logger.prototype, "debug")
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    debugSpy.mockRestore();
  });

  it("should log method, url and status of handled requests", async () => {
    const next: CallHandler = { handle: () => of({ status: "ok" }) };

    await expect(
      lastValueFrom(interceptor.intercept(context, next)),
    ).resolves.toEqual({ status: "ok" });

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(debugSpy.mock.calls[0][0]).toMatch(
      /^POST \/webhook\/moysklad 200 - \d+ms$/,
    );
  });

  it("should log failed requests and rethrow", async () => {
    const failure = new TypeError("bad body");
    const next: CallHandler = { handle: () => throwError(() => failure) };

    await expect(
      lastValueFrom(interceptor.intercept(context, next)),
    ).rejects.toBe(failure);

    expect(debugSpy.mock.calls[0][0]).toMatch(
      /^POST \/webhook\/moysklad failed \(TypeError\) - \d+ms$/,
    );
  });
});
