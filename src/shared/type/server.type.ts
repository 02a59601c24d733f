export enum ServerStatus {
    Stopped = "stopped",
    Starting = "starting",
    Running = "running",
    ShuttingDown = "shutting_down"
}

/**
 * Gauge value exported for each status. 0 means "stopped before
 * construction" and is never reported by a constructed server.
 */
export const SERVER_STATUS_CODE: Readonly<Record<ServerStatus, number>> = {
    [ServerStatus.Starting]: 1,
    [ServerStatus.Running]: 2,
    [ServerStatus.ShuttingDown]: 3,
    [ServerStatus.Stopped]: 4
};

export type ServerMetricsSnapshot = {
    status: ServerStatus;
    statusCode: number;
    uptimeSeconds: number;
    startTime: string;
    port: number;
    activeConnections: number;
    storageConnected: boolean;
    healthy: boolean;
};
