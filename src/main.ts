import { loadConfig } from '@/config';
import type { AppConfig, TargetConfig } from '@/config';
import { Logger } from '@/utils/logger';
import { DepartureTarget, DepartureError } from '@/core';
import { slDepartureSource } from '@/api';
import type { DepartureSource } from '@/types';
import { DepartureErrorCode } from '@/types';

export interface DepartureEngine {
    /** Targets whose first refresh succeeded and which are now polling */
    targets: DepartureTarget[];
    /** Targets that could not be set up */
    failures: Array<{ config: TargetConfig; error: DepartureError }>;
    stop(): void;
}

/**
 * Build a target from its configuration entry (not started)
 */
export function createTarget(
    target: TargetConfig,
    config: AppConfig,
    source: DepartureSource = slDepartureSource
): DepartureTarget {
    return new DepartureTarget({
        siteId: target.siteId,
        siteName: target.siteName,
        filter: {
            modes: target.transportModes,
            directionCode: target.directionCode,
            lines: target.line,
        },
        directionName: target.directionName,
        numDepartures: target.numDepartures,
        intervalMs: target.scanInterval * 1000,
        source,
        view: config.display,
    });
}

/**
 * Create and start every configured target
 * Targets are independent: one failing its first refresh does not stop the others.
 */
export async function startTargets(
    config: AppConfig,
    source: DepartureSource = slDepartureSource
): Promise<DepartureEngine> {
    const results = await Promise.allSettled(
        config.targets.map(async entry => {
            const target = createTarget(entry, config, source);
            await target.start();
            Logger.success('Target ready', { key: target.key, title: target.title });
            return target;
        })
    );

    const targets: DepartureTarget[] = [];
    const failures: DepartureEngine['failures'] = [];

    results.forEach((result, index) => {
        const entry = config.targets[index];
        if (result.status === 'fulfilled') {
            targets.push(result.value);
            return;
        }

        const reason: unknown = result.reason;
        const error =
            reason instanceof DepartureError
                ? reason
                : new DepartureError(
                      `Could not set up site ${entry.siteId}`,
                      DepartureErrorCode.SETUP_FAILED,
                      reason instanceof Error ? reason : undefined
                  );
        Logger.error('Target setup failed', { siteId: entry.siteId, message: error.message });
        failures.push({ config: entry, error });
    });

    return {
        targets,
        failures,
        stop(): void {
            targets.forEach(target => target.stop());
        },
    };
}

/**
 * Load configuration and start polling every configured target
 */
export async function startEngine(configPath?: string): Promise<DepartureEngine> {
    const config = await loadConfig(configPath);
    Logger.setLevel(config.logLevel);
    Logger.setDebugMode(config.debug);
    Logger.success('Configuration loaded', { targets: config.targets.length });

    return startTargets(config);
}
