import { loadNotificationConfig, loadOracleConfig, loadServerConfig } from '../../src/config/reportConfig';
import { createOracle, isOracleConfigured } from '../../src/services/oracle/oracleFactory';
import { ReportSessionStore } from '../../src/services/reportSessionStore';
import { createApp } from './app';

const serverConfig = loadServerConfig();
const oracleConfig = loadOracleConfig();
const notificationConfig = loadNotificationConfig();

if (!isOracleConfigured(oracleConfig)) {
    console.warn(`[Server] oracle mode "${oracleConfig.mode}" is not configured; report runs will fail until it is`);
}

const app = createApp({
    oracle: () => createOracle(oracleConfig),
    notification: notificationConfig,
    sessions: new ReportSessionStore({ idleTtlMs: serverConfig.sessionIdleTtlMs }),
    uploadLimit: serverConfig.uploadLimit
});

app.listen(serverConfig.port, () => {
    console.log(`[Server] fault report service listening on ${serverConfig.port}`);
});
