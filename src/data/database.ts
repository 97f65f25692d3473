import { createPool, Pool } from "mysql2/promise";
import { Config } from "../config/config";

export function createMysqlPool(config: Config): Pool {
    if (!config.databaseUrl) {
        throw new Error("❌ DATABASE_URL is required for the MySQL store");
    }
    // timezone "Z": DATETIME values are written and read back as UTC.
    return createPool({
        uri: config.databaseUrl,
        timezone: "Z",
        connectionLimit: 5,
        waitForConnections: true,
    });
}
