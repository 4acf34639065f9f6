import { loadConfig } from "../lib/config";
import { ConfigurationError } from "../lib/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      supabaseUrl: undefined,
      supabaseAnonKey: undefined,
      logLevel: "info",
      localDbName: "field-timelog-db",
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        SUPABASE_URL: "http://supabase.test",
        SUPABASE_ANON_KEY: "test-anon-key",
        LOG_LEVEL: "debug",
        LOCAL_DB_NAME: "crew-laptop",
      }),
    ).toEqual({
      supabaseUrl: "http://supabase.test",
      supabaseAnonKey: "test-anon-key",
      logLevel: "debug",
      localDbName: "crew-laptop",
    });
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ SUPABASE_URL: "", LOG_LEVEL: "" });

    expect(config.supabaseUrl).toBeUndefined();
    expect(config.logLevel).toBe("info");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid environment: LOG_LEVEL: /);
  });

  it("rejects a malformed Supabase URL", () => {
    expect(() => loadConfig({ SUPABASE_URL: "not a url" })).toThrow(
      "Invalid environment: SUPABASE_URL: Invalid url",
    );
  });
});
