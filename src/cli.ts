#!/usr/bin/env node
import { AppConfig, loadConfig } from './config';
import { createTrackingRuntime } from './bootstrap';
import { TrackingService } from './services/tracking.service';
import { AuditRepository } from './db/repository';
import { CarrierError } from './domain/errors';

const USAGE = `Usage:
  tracking validate <carrier> <tracking-number>
  tracking track <carrier> <tracking-number...>
  tracking capabilities
  tracking migrate

Carriers: fedex, ups, dhl, ontrac`;

function print(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

async function migrate(config: AppConfig): Promise<number> {
    if (!config.db) {
        console.error('DATABASE_URL is not set; nothing to migrate.');
        return 1;
    }
    const repo = AuditRepository.connect(config.db);
    try {
        await repo.migrate();
        return 0;
    } finally {
        await repo.close();
    }
}

async function main(args: string[]): Promise<number> {
    const [command, ...rest] = args;
    if (!command || command === 'help' || command === '--help') {
        console.log(USAGE);
        return command ? 0 : 1;
    }

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        console.error('Config error:', err instanceof Error ? err.message : err);
        console.log('\nHint: copy .env.example to .env and fill in the carrier credentials you have.\n');
        return 1;
    }

    if (command === 'migrate') {
        return migrate(config);
    }

    const runtime = createTrackingRuntime(config);
    const auditRepo = config.db ? AuditRepository.connect(config.db) : undefined;
    const service = new TrackingService({
        orchestrator: runtime.orchestrator,
        registry: runtime.registry,
        auditRepo,
    });

    try {
        switch (command) {
            case 'validate': {
                const [carrier, trackingNumber] = rest;
                print(service.validate(carrier, trackingNumber));
                return 0;
            }
            case 'track': {
                const [carrier, ...trackingNumbers] = rest;
                const response = trackingNumbers.length === 1
                    ? await service.trackSingle(carrier, trackingNumbers[0])
                    : await service.trackBatch(carrier, trackingNumbers);
                print(response);
                return 0;
            }
            case 'capabilities':
                print(service.getCarrierCapabilities());
                return 0;
            default:
                console.error(`Unknown command "${command}"\n`);
                console.log(USAGE);
                return 1;
        }
    } catch (err) {
        if (err instanceof CarrierError) {
            print(err.toJSON());
            return 1;
        }
        throw err;
    } finally {
        await service.flushAudits();
        await auditRepo?.close();
    }
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        console.error('Unexpected error:', err);
        process.exitCode = 1;
    });
