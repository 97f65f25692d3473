import "reflect-metadata";
import { createServer } from "http";
import { container } from "./container";
import { createApp } from "./app";
import { Config } from "./config/config";

const config = container.resolve<Config>("Config");
const app = createApp(container);
const server = createServer(app);

server.listen(config.port, () =>
    console.log(`✅ Reset endpoint running on port ${config.port} at ${config.resetPath}`)
);
