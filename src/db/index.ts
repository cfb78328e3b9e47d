import postgres from "postgres";

export type Sql = postgres.Sql;

export function createSql(config: { url: string; poolMax: number }): Sql {
  return postgres(config.url, {
    max: config.poolMax,
    idle_timeout: 20,
    transform: {
      undefined: null,
    },
  });
}
