import express from 'express';
import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import http from 'http';
import type { AddressInfo } from 'net';
import { z, ZodError } from 'zod';
import { SpeciesRegistry } from '../kernel-core/Registry.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import { ProjectionEngine, HabitatProjection } from '../kernel-core/L3/Projections.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { identitySchema, commandSchema } from '../kernel-core/L0/Schemas.js';
import { ErrorCode, RegistryError } from '../kernel-core/Errors.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { loadConfig } from '../config.js';
import type { RegistryConfig } from '../config.js';

const STATUS: Record<ErrorCode, number> = {
    [ErrorCode.INVALID_ARGUMENT]: 400,
    [ErrorCode.SIGNATURE_INVALID]: 401,
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.FORBIDDEN]: 403,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.ALREADY_AUTHORIZED]: 409,
    [ErrorCode.NOT_AUTHORIZED]: 409,
    [ErrorCode.INACTIVE]: 409,
    [ErrorCode.REPLAY_DETECTED]: 409,
    [ErrorCode.REGISTRY_NOT_ACTIVE]: 503,
    [ErrorCode.INTEGRITY_BREACH]: 500,
    [ErrorCode.REPLAY_FAILURE]: 500,
    [ErrorCode.COMMIT_FAILED]: 500,
};

const recordIdParam = z.object({ id: z.string().regex(/^\d+$/, 'id must be a non-negative integer').transform(v => Number(v)) });
const identityParam = z.object({ identity: identitySchema });
const eventsQuery = z.object({
    after: z.string().regex(/^\d+$/, 'after must be a non-negative integer').transform(v => Number(v)).optional()
});

// Express 4 does not forward rejected promises to the error handler by itself
function route(fn: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
    return (req, res, next) => {
        Promise.resolve()
            .then(() => fn(req, res))
            .catch(next);
    };
}

export class RegistryServer {
    private app: express.Express;
    private server: http.Server | null = null;

    constructor(
        private registry: SpeciesRegistry,
        private habitats: HabitatProjection,
        private port: number = 3000,
        private host: string = '127.0.0.1'
    ) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json({ limit: '64kb' }));
        this.setupRoutes();
    }

    public start(): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, this.host);
            server.once('error', reject);
            server.once('listening', () => {
                const address = server.address();
                if (address === null || typeof address === 'string') {
                    reject(new Error(`RegistryServer: unexpected listen address ${String(address)}`));
                    return;
                }
                this.server = server;
                console.log(`[RegistryServer] Listening on ${address.address}:${address.port}`);
                resolve(address);
            });
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (server) {
            await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        }
        await this.registry.close();
    }

    private setupRoutes() {
        // Request log
        this.app.use((req, res, next) => {
            const started = Date.now();
            res.on('finish', () => {
                console.log(`[RegistryServer] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
            });
            next();
        });

        this.app.get('/health', (req, res) => {
            res.json({
                lifecycle: this.registry.Lifecycle,
                owner: this.registry.getOwner(),
                version: this.registry.state.current.version,
                records: this.registry.records.count,
                pendingWrites: this.registry.pendingWrites
            });
        });

        this.app.get('/owner', (req, res) => {
            res.json({ owner: this.registry.getOwner() });
        });

        this.app.get('/contributors/:identity', (req, res) => {
            const { identity } = identityParam.parse(req.params);
            res.json({ identity, ...this.registry.getContributor(identity) });
        });

        this.app.get('/contributors/:identity/records', (req, res) => {
            const { identity } = identityParam.parse(req.params);
            res.json({ identity, records: this.registry.getContributorRecords(identity) });
        });

        this.app.get('/records', (req, res) => {
            res.json(this.registry.listRecords());
        });

        this.app.get('/records/:id', (req, res) => {
            const { id } = recordIdParam.parse(req.params);
            res.json(this.registry.getRecord(id));
        });

        this.app.get('/habitats/:habitat', (req, res) => {
            const habitat = req.params['habitat'] ?? '';
            res.json({ habitat: HabitatProjection.key(habitat), records: this.habitats.lookup(habitat) });
        });

        this.app.get('/events', route(async (req, res) => {
            const { after } = eventsQuery.parse(req.query);
            res.json(await this.registry.Audit.getHistory(after ?? 0));
        }));

        this.app.get('/integrity', route(async (req, res) => {
            res.json(await this.registry.verifyIntegrity());
        }));

        // Signed command execution
        this.app.post('/commands', route(async (req, res) => {
            const command = commandSchema.parse(req.body);
            const receipt = await this.registry.execute(command);
            res.json(receipt);
        }));

        this.app.use(this.errorHandler);
    }

    private errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
        if (err instanceof RegistryError) {
            res.status(STATUS[err.code]).json({
                error: { code: err.code, message: err.message, metadata: err.metadata ?? {} }
            });
            return;
        }
        if (err instanceof ZodError) {
            res.status(400).json({
                error: {
                    code: ErrorCode.INVALID_ARGUMENT,
                    message: 'Request validation failed',
                    metadata: { issues: err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
                }
            });
            return;
        }
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: { code: ErrorCode.INVALID_ARGUMENT, message: 'Malformed JSON body', metadata: {} } });
            return;
        }

        console.error(`[RegistryServer] ${req.method} ${req.originalUrl} failed:`, err);
        res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal error', metadata: {} } });
    };
}

/**
 * Wires the SQLite log, replays it, boots the registry and starts listening.
 */
export async function bootstrap(config: RegistryConfig): Promise<RegistryServer> {
    const store = new SQLiteEventStore(config.databasePath);
    const audit = new AuditLog(store);
    const projections = new ProjectionEngine();
    const habitats = new HabitatProjection();
    projections.register(habitats);

    const registry = new SpeciesRegistry({ owner: config.owner, audit, projections });

    console.log('[RegistryServer] Replaying history...');
    await new ReplayEngine().replay(audit, registry);
    await registry.boot();

    const server = new RegistryServer(registry, habitats, config.port, config.host);
    await server.start();
    return server;
}

// Start if run directly
if (require.main === module) {
    bootstrap(loadConfig()).catch((e: unknown) => {
        console.error('[RegistryServer] Startup failed:', e);
        process.exitCode = 1;
    });
}
