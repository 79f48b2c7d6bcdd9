import { EventEmitter } from "node:events";
import { IllegalStateError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export type EndpointState = "uninitialized" | "initialized" | "started" | "stopped";

/**
 * Lifecycle verbs a supervising application calls on an endpoint.
 *
 * Valid sequence: init → start → stop (→ start → stop)*.
 */
export interface Lifecycle {
    /** Validate configuration and bind collaborators. */
    init(): void;

    /** Begin receiving events. */
    start(): void;

    /** Stop receiving events. Safe to call in any state. */
    stop(): void;

    /** Current lifecycle state. */
    get state(): EndpointState;

    /** Whether the endpoint is started. */
    get running(): boolean;
}

export interface LifecycleEndpointOptions {
    /** Name used in log records and error messages. */
    componentName?: string;
    /** Logger to use. Default: a pino logger named after the component. */
    logger?: Logger;
}

/**
 * Base class handling lifecycle state for an endpoint.
 *
 * Subclasses implement `onInit`, `doStart` and `doStop`. A hook that throws
 * leaves the state unchanged. A transition requested while another one is
 * running (for example from a callback fired inside `doStart`) is rejected.
 *
 * Events:
 * - "start" — the endpoint entered the started state
 * - "stop" — the endpoint left the started state
 */
export abstract class LifecycleEndpoint extends EventEmitter implements Lifecycle {
    readonly componentName: string;
    protected readonly logger: Logger;
    private _state: EndpointState = "uninitialized";
    private transitioning = false;

    constructor(options: LifecycleEndpointOptions = {}) {
        super();
        this.componentName = options.componentName ?? this.defaultComponentName();
        this.logger = (options.logger ?? createLogger(this.componentName)).child({
            component: this.componentName,
        });
    }

    /** Kind of endpoint, e.g. "roster-event-inbound-channel-adapter". */
    abstract get componentType(): string;

    protected abstract onInit(): void;
    protected abstract doStart(): void;
    protected abstract doStop(): void;

    get state(): EndpointState {
        return this._state;
    }

    get running(): boolean {
        return this._state === "started";
    }

    /** Whether init() has completed. */
    get initialized(): boolean {
        return this._state !== "uninitialized";
    }

    init(): void {
        if (this.initialized) return;

        this.transition("init", () => {
            this.onInit();
            this._state = "initialized";
        });
        this.logger.debug("initialized");
    }

    start(): void {
        if (!this.initialized) {
            throw new IllegalStateError(`${this.componentName}#${this.componentType} must be initialized`);
        }
        if (this.running) return;

        this.transition("start", () => {
            this.doStart();
            this._state = "started";
        });
        this.logger.info("started");
        this.emit("start");
    }

    stop(): void {
        if (!this.running) return;

        this.transition("stop", () => {
            this.doStop();
            this._state = "stopped";
        });
        this.logger.info("stopped");
        this.emit("stop");
    }

    protected defaultComponentName(): string {
        return "endpoint";
    }

    private transition(verb: string, body: () => void): void {
        if (this.transitioning) {
            throw new IllegalStateError(
                `${this.componentName}: cannot ${verb} while another lifecycle transition is in progress`,
            );
        }

        this.transitioning = true;
        try {
            body();
        } finally {
            this.transitioning = false;
        }
    }
}
