// Domain Layer - Value Objects
export * from './domain/value-objects/ActionType.js';
export * from './domain/value-objects/HardwareStates.js';
export * from './domain/value-objects/HardwareCapability.js';
export * from './domain/value-objects/ResourceValue.js';
export * from './domain/value-objects/ResourceTargets.js';
export * from './domain/value-objects/OptimizationPriority.js';

// Domain Layer - Entities
export * from './domain/entities/SystemContext.js';
export * from './domain/entities/ResourceAction.js';
export * from './domain/entities/AgentProposal.js';
export * from './domain/entities/ExecutionPlan.js';
export * from './domain/entities/ExecutionResult.js';
export * from './domain/entities/CoordinationSignal.js';
export * from './domain/entities/AgentState.js';
export * from './domain/entities/UserOverride.js';

// Domain Layer - Interfaces & Services
export * from './domain/interfaces/IOptimizationAgent.js';
export * from './domain/services/ActionScoring.js';
export * from './domain/services/ThermalTrendCalculator.js';

// Domain Layer - Events
export * from './domain/events/IDomainEvent.js';
export * from './domain/events/OptimizationCycleCompleted.js';
export * from './domain/events/ExecutionPlanRejected.js';
export * from './domain/events/AgentProposalFailed.js';

// Application Layer - Ports
export * from './application/ports/IEventDispatcher.js';
export * from './application/ports/IObservabilityContext.js';
export * from './application/ports/IContextCollector.js';
export * from './application/ports/IActionHandler.js';
export * from './application/ports/ICapabilityProbe.js';

// Application Layer - Services
export * from './application/services/AgentCoordinationService.js';
export * from './application/services/DecisionArbitrationService.js';
export * from './application/services/SafetyValidationService.js';
export * from './application/services/UserOverrideService.js';
export * from './application/services/ActionSafetyService.js';
export * from './application/services/ActionExecutionService.js';
export * from './application/services/HardwareCapabilityService.js';
export * from './application/services/OptimizationCycleService.js';

// Infrastructure Layer
export * from './infrastructure/messaging/InMemoryEventDispatcher.js';
export * from './infrastructure/observability/Logger.js';
export * from './infrastructure/observability/MetricsCollector.js';
export * from './infrastructure/observability/Tracer.js';
export * from './infrastructure/observability/CycleContext.js';
export * from './infrastructure/resilience/CircuitBreaker.js';
export * from './infrastructure/resilience/CircuitBreakerConfig.js';
export * from './infrastructure/config/OrchestratorConfig.js';
export * from './infrastructure/config/FeatureFlags.js';
export * from './infrastructure/handlers/CoordinationActionHandler.js';
export * from './infrastructure/context/TrendingContextCollector.js';

// Shared
export * from './shared/errors/ErrorCodes.js';
export * from './shared/errors/OrchestrationError.js';
export * from './shared/errors/ErrorNormalizer.js';
export * from './shared/validation/index.js';
export * from './shared/utils/IdGenerator.js';

// Composition root
export * from './AppContainer.js';
