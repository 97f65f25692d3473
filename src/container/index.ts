import { container, instanceCachingFactory } from "tsyringe";
import { Pool } from "mysql2/promise";
import config, { Config } from "../config/config";
import { Clock, systemClock } from "../utils/clock";
import { generateResetToken, TokenGenerator } from "../utils/crypto";
import { IResetTokenRepository } from "../data/interfaces/IResetTokenRepository";
import { MysqlResetTokenRepository } from "../data/repositories/MysqlResetTokenRepository";
import { SqliteResetTokenRepository } from "../data/repositories/SqliteResetTokenRepository";
import { createMysqlPool } from "../data/database";
import { IMailClient } from "../clients/MailClient";
import { SmtpMailClient } from "../clients/SmtpMailClient";
import { IPasswordUpdater } from "../clients/PasswordUpdater";
import { HttpPasswordUpdater } from "../clients/HttpPasswordUpdater";
import { LoggingPasswordUpdater } from "../clients/LoggingPasswordUpdater";
import { TelegramClient } from "../clients/TelegramClient";
import { ResetTokenService } from "../business/services/ResetTokenService";
import { TransactionalMailService } from "../business/services/TransactionalMailService";
import { ResetConversationService } from "../business/services/ResetConversationService";
import { TelegramPoller } from "../business/services/TelegramPoller";
import { ResetController } from "../controllers/ResetController";
import { TelegramController } from "../controllers/TelegramController";

// Configuration and primitives
container.register<Config>("Config", { useValue: config });
container.register<Clock>("Clock", { useValue: systemClock });
container.register<TokenGenerator>("TokenGenerator", { useValue: generateResetToken });

// Register clients
container.register<IMailClient>("IMailClient", { useClass: SmtpMailClient });
container.register<IPasswordUpdater>("IPasswordUpdater", {
    useFactory: instanceCachingFactory<IPasswordUpdater>((c) => {
        const { passwordUpdateUrl, passwordUpdateToken } = c.resolve<Config>("Config");
        return passwordUpdateUrl
            ? new HttpPasswordUpdater(passwordUpdateUrl, passwordUpdateToken)
            : new LoggingPasswordUpdater();
    }),
});
container.registerSingleton(TelegramClient, TelegramClient);

// Register business services
container.register(ResetTokenService, { useClass: ResetTokenService });
container.register(TransactionalMailService, { useClass: TransactionalMailService });
container.registerSingleton(ResetConversationService, ResetConversationService);
container.registerSingleton(TelegramPoller, TelegramPoller);
container.register(ResetController, { useClass: ResetController });
container.register(TelegramController, { useClass: TelegramController });

// Register data repositories
container.register<Pool>("MysqlPool", {
    useFactory: instanceCachingFactory<Pool>((c) => createMysqlPool(c.resolve<Config>("Config"))),
});
container.register<IResetTokenRepository>("IResetTokenRepository", {
    useFactory: instanceCachingFactory<IResetTokenRepository>((c) => {
        const { databaseUrl, sqlitePath } = c.resolve<Config>("Config");
        if (databaseUrl) {
            return c.resolve(MysqlResetTokenRepository);
        }
        console.warn(`[container] DATABASE_URL not set, using embedded SQLite store at ${sqlitePath}`);
        return new SqliteResetTokenRepository(sqlitePath);
    }),
});

export { container };
