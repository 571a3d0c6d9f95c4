import { IObservabilityContext } from './application/ports/IObservabilityContext.js';
import { IContextCollector } from './application/ports/IContextCollector.js';
import { IActionHandler } from './application/ports/IActionHandler.js';
import { ICapabilityProbe } from './application/ports/ICapabilityProbe.js';
import { AgentCoordinationService } from './application/services/AgentCoordinationService.js';
import { DecisionArbitrationService } from './application/services/DecisionArbitrationService.js';
import { SafetyValidationService } from './application/services/SafetyValidationService.js';
import { UserOverrideService } from './application/services/UserOverrideService.js';
import { ActionSafetyService } from './application/services/ActionSafetyService.js';
import { ActionExecutionService } from './application/services/ActionExecutionService.js';
import { HardwareCapabilityService } from './application/services/HardwareCapabilityService.js';
import { OptimizationCycleService } from './application/services/OptimizationCycleService.js';
import { IOptimizationAgent } from './domain/interfaces/IOptimizationAgent.js';
import { InMemoryEventDispatcher } from './infrastructure/messaging/InMemoryEventDispatcher.js';
import { ConsoleLogger, ILogger } from './infrastructure/observability/Logger.js';
import { InMemoryMetricsCollector, IMetricsCollector } from './infrastructure/observability/MetricsCollector.js';
import { NullTracer, SimpleTracer, ITracer } from './infrastructure/observability/Tracer.js';
import { CircuitBreakerRegistry } from './infrastructure/resilience/CircuitBreaker.js';
import { HANDLER_CIRCUIT_BREAKER_CONFIG } from './infrastructure/resilience/CircuitBreakerConfig.js';
import { OrchestratorConfig, OrchestratorConfigFactory } from './infrastructure/config/OrchestratorConfig.js';
import { FeatureFlags } from './infrastructure/config/FeatureFlags.js';
import { CoordinationActionHandler } from './infrastructure/handlers/CoordinationActionHandler.js';
import { TrendingContextCollector } from './infrastructure/context/TrendingContextCollector.js';
import { ThermalTrendCalculator } from './domain/services/ThermalTrendCalculator.js';

/**
 * Platform pieces the core does not implement: the agents themselves,
 * how the machine is read, how it is written, and how control paths are
 * probed.
 */
export interface PlatformBindings {
    /** Agents may need the bus, so they are built after it exists. */
    agents: (coordination: AgentCoordinationService) => readonly IOptimizationAgent[];
    collector: IContextCollector;
    handlers: readonly IActionHandler[];
    probe: ICapabilityProbe;
}

export interface AppContainerOptions {
    config?: OrchestratorConfig;
    observability?: Partial<IObservabilityContext>;
    clock?: () => Date;
}

export class AppContainer {
    public readonly config: OrchestratorConfig;
    public readonly featureFlags: FeatureFlags;

    // Observability
    public readonly logger: ILogger;
    public readonly metrics: IMetricsCollector;
    public readonly tracer: ITracer;
    public readonly observability: IObservabilityContext;

    // Services
    public readonly eventDispatcher: InMemoryEventDispatcher;
    public readonly coordinationService: AgentCoordinationService;
    public readonly arbitrationService: DecisionArbitrationService;
    public readonly safetyService: SafetyValidationService;
    public readonly userOverrideService: UserOverrideService;
    public readonly actionSafetyService: ActionSafetyService;
    public readonly executionService: ActionExecutionService;
    public readonly capabilityService: HardwareCapabilityService;
    public readonly cycleService: OptimizationCycleService;
    public readonly thermalTrend: ThermalTrendCalculator;

    public readonly agents: readonly IOptimizationAgent[];

    constructor(platform: PlatformBindings, options: AppContainerOptions = {}) {
        const clock = options.clock ?? (() => new Date());

        // 1. Configuration
        this.config = options.config ?? OrchestratorConfigFactory.createFromEnv();
        this.featureFlags = new FeatureFlags(this.config.features);

        // 2. Observability (initialized first, used everywhere)
        this.logger = options.observability?.logger
            ?? new ConsoleLogger({ service: 'resource-orchestrator' }, this.config.logLevel);
        this.metrics = options.observability?.metrics ?? new InMemoryMetricsCollector();
        this.tracer = options.observability?.tracer
            ?? (this.featureFlags.telemetryEnabled ? new SimpleTracer() : new NullTracer());
        this.observability = {
            logger: this.logger,
            metrics: this.metrics,
            tracer: this.tracer,
        };

        // 3. Coordination and decision services
        this.eventDispatcher = new InMemoryEventDispatcher(this.logger.child({ component: 'events' }));
        this.coordinationService = new AgentCoordinationService(
            {
                signalRetentionMs: this.config.signalRetentionMs,
                recentWindowMs: this.config.recentWindowMs,
                emergencyCorroboration: this.config.emergencyCorroboration,
            },
            this.withComponent('coordination'),
            clock
        );
        this.arbitrationService = new DecisionArbitrationService(this.withComponent('arbitration'), clock);
        this.safetyService = new SafetyValidationService(this.withComponent('safety'));

        // 4. Execution
        this.userOverrideService = new UserOverrideService(this.withComponent('overrides'), clock);
        this.actionSafetyService = new ActionSafetyService(
            this.userOverrideService,
            this.coordinationService,
            this.withComponent('action-safety'),
            clock
        );
        const breakers = new CircuitBreakerRegistry({
            ...HANDLER_CIRCUIT_BREAKER_CONFIG,
            failureThreshold: this.config.handlerFailureThreshold,
            recoveryTimeoutMs: this.config.handlerRecoveryMs,
            onStateChange: (from, to) => this.logger.warn('Handler circuit changed state', { from, to }),
        });
        this.executionService = new ActionExecutionService(
            [
                new CoordinationActionHandler(this.coordinationService, this.logger.child({ component: 'coordination-handler' }), clock),
                ...platform.handlers,
            ],
            this.actionSafetyService,
            breakers,
            this.withComponent('execution')
        );
        this.capabilityService = new HardwareCapabilityService(platform.probe, this.withComponent('capabilities'));

        // 5. Agents and the cycle driver step
        this.agents = platform.agents(this.coordinationService);
        this.thermalTrend = new ThermalTrendCalculator();
        this.cycleService = new OptimizationCycleService({
            agents: this.agents,
            collector: new TrendingContextCollector(platform.collector, this.thermalTrend),
            postExecutionCollector: platform.collector,
            arbitration: this.arbitrationService,
            coordination: this.coordinationService,
            safety: this.safetyService,
            executor: this.executionService,
            capabilities: this.capabilityService,
            featureFlags: this.featureFlags,
            eventDispatcher: this.eventDispatcher,
            observability: this.withComponent('cycle'),
            agentTimeoutMs: this.config.agentTimeoutMs,
            cycleIntervalMs: this.config.cycleIntervalMs,
            clock,
        });

        this.logger.info('Resource orchestrator initialized', {
            agents: this.agents.map(a => a.agentName),
            handlers: platform.handlers.map(h => h.name),
            features: this.featureFlags.describe(),
        });
    }

    private withComponent(component: string): IObservabilityContext {
        return {
            logger: this.logger.child({ component }),
            metrics: this.metrics,
            tracer: this.tracer,
        };
    }
}
