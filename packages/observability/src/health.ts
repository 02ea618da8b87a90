/**
 * Deep Health Check
 *
 * Goes beyond the basic /healthz ping by running one probe per dependency
 * (database, rate source) and folding their results into one status.
 */

import { log } from './logger.js';

export type DependencyStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface DependencyCheck {
    name: string;
    status: DependencyStatus;
    latencyMs: number;
    message?: string;
}

export interface HealthProbe {
    name: string;
    /** Resolve to a status (and optional detail); a rejection counts as unhealthy. */
    check: () => Promise<{ status: DependencyStatus; message?: string }>;
}

export interface DeepHealthResult {
    status: DependencyStatus;
    service: string;
    uptime: number;
    checks: DependencyCheck[];
    timestamp: string;
}

const startedAt = Date.now();

async function runProbe(probe: HealthProbe): Promise<DependencyCheck> {
    const start = Date.now();
    try {
        const outcome = await probe.check();
        return {
            name: probe.name,
            status: outcome.status,
            latencyMs: Date.now() - start,
            ...(outcome.message ? { message: outcome.message } : {})
        };
    } catch (error) {
        return {
            name: probe.name,
            status: 'unhealthy',
            latencyMs: Date.now() - start,
            message: error instanceof Error ? error.message : String(error)
        };
    }
}

export function worstStatus(statuses: DependencyStatus[]): DependencyStatus {
    if (statuses.includes('unhealthy')) return 'unhealthy';
    if (statuses.includes('degraded')) return 'degraded';
    return 'healthy';
}

export async function deepHealthCheck(serviceName: string, probes: HealthProbe[]): Promise<DeepHealthResult> {
    const checks = await Promise.all(probes.map((probe) => runProbe(probe)));
    const overallStatus = worstStatus(checks.map((check) => check.status));

    const result: DeepHealthResult = {
        status: overallStatus,
        service: serviceName,
        uptime: Math.floor((Date.now() - startedAt) / 1000),
        checks,
        timestamp: new Date().toISOString()
    };

    if (overallStatus !== 'healthy') {
        log('warn', 'Deep health check not healthy', {
            service: serviceName,
            status: overallStatus,
            checks
        });
    }

    return result;
}
