/**
 * OptimizationCycleService.test.ts - End-to-end cycle behaviour.
 *
 * Uses the real arbitration, safety, coordination and execution services
 * with a recording hardware handler and scripted agents.
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { OptimizationCycleService, OptimizationCycleDependencies } from '../OptimizationCycleService.js';
import { AgentCoordinationService } from '../AgentCoordinationService.js';
import { DecisionArbitrationService } from '../DecisionArbitrationService.js';
import { SafetyValidationService } from '../SafetyValidationService.js';
import { UserOverrideService } from '../UserOverrideService.js';
import { ActionSafetyService } from '../ActionSafetyService.js';
import { ActionExecutionService } from '../ActionExecutionService.js';
import { HardwareCapabilityService } from '../HardwareCapabilityService.js';
import { IEventDispatcher } from '../../ports/IEventDispatcher.js';
import { MetricNames, SpanNames } from '../../ports/IObservabilityContext.js';
import { IOptimizationAgent } from '../../../domain/interfaces/IOptimizationAgent.js';
import { AgentPriority, AgentProposal, IAgentProposal } from '../../../domain/entities/AgentProposal.js';
import { createAction, IResourceAction } from '../../../domain/entities/ResourceAction.js';
import { IExecutionResult } from '../../../domain/entities/ExecutionResult.js';
import { ISystemContext } from '../../../domain/entities/SystemContext.js';
import { IDomainEvent } from '../../../domain/events/IDomainEvent.js';
import { AgentProposalFailed } from '../../../domain/events/AgentProposalFailed.js';
import { ExecutionPlanRejected } from '../../../domain/events/ExecutionPlanRejected.js';
import { OptimizationCycleCompleted } from '../../../domain/events/OptimizationCycleCompleted.js';
import { HardwareCapability } from '../../../domain/value-objects/HardwareCapability.js';
import { ResourceValues } from '../../../domain/value-objects/ResourceValue.js';
import { ResourceTargets } from '../../../domain/value-objects/ResourceTargets.js';
import { FeatureFlags } from '../../../infrastructure/config/FeatureFlags.js';
import { CircuitBreakerRegistry } from '../../../infrastructure/resilience/CircuitBreaker.js';
import { HANDLER_CIRCUIT_BREAKER_CONFIG } from '../../../infrastructure/resilience/CircuitBreakerConfig.js';
import { buildContext, createClock, createObservability, RecordingHandler, TestObservability } from './fixtures.js';

/**
 * Agent whose proposal is scripted per test.
 */
class ScriptedAgent implements IOptimizationAgent {
    readonly results: IExecutionResult[] = [];

    constructor(
        readonly agentName: string,
        private readonly script: (context: ISystemContext) => Promise<IAgentProposal>,
        readonly requiredCapabilities?: readonly HardwareCapability[],
        readonly priority: AgentPriority = 'normal'
    ) {}

    static proposing(agentName: string, actions: IResourceAction[], requiredCapabilities?: HardwareCapability[]): ScriptedAgent {
        return new ScriptedAgent(
            agentName,
            async () => AgentProposal.create(agentName, 'normal', actions),
            requiredCapabilities
        );
    }

    propose(context: ISystemContext): Promise<IAgentProposal> {
        return this.script(context);
    }

    async onExecuted(result: IExecutionResult): Promise<void> {
        this.results.push(result);
    }
}

describe('OptimizationCycleService', () => {
    let observability: TestObservability;
    let clock: ReturnType<typeof createClock>;
    let handler: RecordingHandler;
    let coordination: AgentCoordinationService;
    let executor: ActionExecutionService;
    let events: IDomainEvent[];
    let eventDispatcher: IEventDispatcher;
    let contextBefore: ISystemContext;
    let contextAfter: ISystemContext;
    let collect: Mock<[], Promise<ISystemContext>>;

    const lowerPl2 = createAction('critical', ResourceTargets.CPU_PL2, ResourceValues.watts(60), 'Cool down');
    const lowerTgp = createAction('proactive', ResourceTargets.GPU_TGP, ResourceValues.watts(70), 'GPU idle');

    function createService(
        agents: IOptimizationAgent[],
        overrides: Partial<OptimizationCycleDependencies> = {}
    ): OptimizationCycleService {
        return new OptimizationCycleService({
            agents,
            collector: { collect },
            arbitration: new DecisionArbitrationService(observability, clock.now),
            coordination,
            safety: new SafetyValidationService(observability),
            executor,
            capabilities: new HardwareCapabilityService(
                { probe: async capability => capability !== 'keyboard_lighting' },
                observability
            ),
            featureFlags: new FeatureFlags(),
            eventDispatcher,
            observability,
            agentTimeoutMs: 50,
            clock: clock.now,
            ...overrides,
        });
    }

    beforeEach(() => {
        observability = createObservability();
        clock = createClock();
        handler = new RecordingHandler('hardware', [
            ResourceTargets.CPU_PL2,
            ResourceTargets.GPU_TGP,
            ResourceTargets.POWER_MODE,
            ResourceTargets.FAN_PROFILE,
        ]);
        coordination = new AgentCoordinationService({}, observability, clock.now);
        executor = new ActionExecutionService(
            [handler],
            new ActionSafetyService(new UserOverrideService(undefined, clock.now), coordination, observability, clock.now),
            new CircuitBreakerRegistry(HANDLER_CIRCUIT_BREAKER_CONFIG),
            observability
        );

        events = [];
        eventDispatcher = {
            dispatch: vi.fn(async (event: IDomainEvent) => {
                events.push(event);
            }),
            subscribe: vi.fn(),
        };

        contextBefore = buildContext();
        contextAfter = buildContext({ thermal: { cpuTempC: 55 } });
        collect = vi.fn<[], Promise<ISystemContext>>()
            .mockResolvedValueOnce(contextBefore)
            .mockResolvedValue(contextAfter);
    });

    it('should run a full cycle and notify every agent', async () => {
        const thermal = ScriptedAgent.proposing('ThermalAgent', [lowerPl2]);
        const gpu = ScriptedAgent.proposing('GpuAgent', [lowerTgp]);
        const service = createService([thermal, gpu]);

        const report = await service.runCycle();

        expect(report.status).toBe('completed');
        expect(report.cycleNumber).toBe(1);
        expect(report.failedAgents).toEqual([]);
        expect(report.result?.success).toBe(true);
        expect(report.result?.executedActions).toEqual([
            { ...lowerPl2, sourceAgent: 'ThermalAgent' },
            { ...lowerTgp, sourceAgent: 'GpuAgent' },
        ]);
        expect(handler.calls).toEqual(['execute:CPU_PL2', 'execute:GPU_TGP']);

        expect(thermal.results).toHaveLength(1);
        expect(thermal.results[0].contextBefore).toBe(contextBefore);
        expect(thermal.results[0].contextAfter).toBe(contextAfter);
        expect(gpu.results[0]).toBe(thermal.results[0]);

        expect(events).toHaveLength(1);
        const completed = events[0];
        expect(completed).toBeInstanceOf(OptimizationCycleCompleted);
        if (completed instanceof OptimizationCycleCompleted) {
            expect(completed.cycleId).toBe(report.cycleId);
            expect(completed.proposalCount).toBe(2);
            expect(completed.executedActionCount).toBe(2);
            expect(completed.conflictCount).toBe(0);
            expect(completed.success).toBe(true);
        }
    });

    it('should fold executed actions into each agent state', async () => {
        const quiet = createAction('reactive', ResourceTargets.FAN_PROFILE, ResourceValues.fanProfile('quiet'), 'Night');
        const loud = createAction('critical', ResourceTargets.FAN_PROFILE, ResourceValues.fanProfile('max_performance'), 'Hot');
        const service = createService([
            ScriptedAgent.proposing('AcousticAgent', [quiet]),
            ScriptedAgent.proposing('ThermalAgent', [loud, lowerPl2]),
        ]);

        await service.runCycle();

        expect(coordination.stateOf('AcousticAgent')).toMatchObject({
            actionsProposed: 1,
            actionsExecuted: 0,
            successRate: 0,
        });
        expect(coordination.stateOf('ThermalAgent')).toMatchObject({
            actionsProposed: 2,
            actionsExecuted: 2,
            successRate: 1,
        });
        expect(service.getStatistics()).toMatchObject({
            totalCycles: 1,
            totalActions: 2,
            totalConflicts: 1,
        });
    });

    it('should end an idle cycle without executing or notifying', async () => {
        const agent = new ScriptedAgent('IdleAgent', async () => AgentProposal.empty('IdleAgent'));
        const service = createService([agent]);

        const report = await service.runCycle();

        expect(report.status).toBe('idle');
        expect(report.plan?.actions).toEqual([]);
        expect(agent.results).toEqual([]);
        expect(handler.calls).toEqual([]);
        expect(events).toEqual([]);
        expect(service.getStatistics().totalCycles).toBe(1);
        expect(collect).toHaveBeenCalledTimes(1);
    });

    it('should skip the cycle when the snapshot cannot be read', async () => {
        collect.mockReset();
        collect.mockRejectedValue(new Error('EC read timeout'));
        const propose = vi.fn(async () => AgentProposal.empty('ThermalAgent'));
        const service = createService([new ScriptedAgent('ThermalAgent', propose)]);

        const report = await service.runCycle();

        expect(report.status).toBe('skipped');
        expect(report.skipReason).toBe('context_unavailable');
        expect(propose).not.toHaveBeenCalled();
        expect(service.getStatistics()).toMatchObject({ totalCycles: 0, skippedCycles: 1 });
        expect(observability.metrics.getCounter(MetricNames.CYCLES_SKIPPED_TOTAL, { reason: 'context_unavailable' })).toBe(1);
    });

    it('should skip a call made while a cycle is running', async () => {
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const slow = new ScriptedAgent('SlowAgent', async () => {
            await gate;
            return AgentProposal.create('SlowAgent', 'normal', [lowerTgp]);
        });
        const service = createService([slow], { agentTimeoutMs: 5_000 });

        const first = service.runCycle();
        expect(service.isRunning).toBe(true);

        const second = await service.runCycle();
        expect(second.status).toBe('skipped');
        expect(second.skipReason).toBe('busy');
        expect(second.cycleNumber).toBe(0);

        release();
        const firstReport = await first;
        expect(firstReport.status).toBe('completed');
        expect(firstReport.cycleNumber).toBe(1);
        expect(service.isRunning).toBe(false);
        expect(service.getStatistics().skippedCycles).toBe(1);
    });

    it('should drop a proposal that misses the deadline and keep the others', async () => {
        const stuck = new ScriptedAgent('StuckAgent', () => new Promise<IAgentProposal>(() => undefined));
        const gpu = ScriptedAgent.proposing('GpuAgent', [lowerTgp]);
        const service = createService([stuck, gpu], { agentTimeoutMs: 20 });

        const report = await service.runCycle();

        expect(report.status).toBe('completed');
        expect(report.failedAgents).toEqual(['StuckAgent']);
        expect(report.result?.executedActions).toEqual([{ ...lowerTgp, sourceAgent: 'GpuAgent' }]);
        expect(stuck.results).toHaveLength(1);

        const failure = events.find(e => e instanceof AgentProposalFailed);
        expect(failure).toBeInstanceOf(AgentProposalFailed);
        if (failure instanceof AgentProposalFailed) {
            expect(failure.agentName).toBe('StuckAgent');
            expect(failure.errorCode).toBe('AGENT_TIMEOUT');
            expect(failure.message).toBe('Agent StuckAgent did not propose within 20ms');
        }
        expect(observability.metrics.getCounter(MetricNames.AGENT_TIMEOUTS_TOTAL, { agent: 'StuckAgent' })).toBe(1);
    });

    it('should treat a throwing agent as an empty proposal', async () => {
        const broken = new ScriptedAgent('BrokenAgent', () => {
            throw new Error('sensor offline');
        });
        const service = createService([broken, ScriptedAgent.proposing('ThermalAgent', [lowerPl2])]);

        const report = await service.runCycle();

        expect(report.status).toBe('completed');
        expect(report.failedAgents).toEqual(['BrokenAgent']);
        expect(service.getStatistics().failedProposals).toBe(1);

        const failure = events.find(e => e instanceof AgentProposalFailed);
        if (!(failure instanceof AgentProposalFailed)) {
            throw new Error('expected an AgentProposalFailed event');
        }
        expect(failure.errorCode).toBe('AGENT_FAILURE');
        expect(failure.message).toBe('Agent BrokenAgent failed: sensor offline');
    });

    it('should discard an unsafe plan as a whole and tell the agents', async () => {
        collect.mockReset();
        collect.mockResolvedValue(buildContext({ thermal: { cpuTempC: 95 } }));
        const boost = createAction('proactive', ResourceTargets.CPU_PL2, ResourceValues.watts(130), 'Benchmark');
        const booster = ScriptedAgent.proposing('PerformanceAgent', [boost, lowerTgp]);
        const service = createService([booster]);

        const report = await service.runCycle();

        expect(report.status).toBe('rejected');
        expect(report.violations?.map(v => v.kind)).toEqual(['thermal']);
        expect(handler.calls).toEqual([]);
        expect(booster.results).toHaveLength(1);
        expect(booster.results[0].success).toBe(false);
        expect(booster.results[0].executedActions).toEqual([]);
        expect(coordination.stateOf('PerformanceAgent')).toMatchObject({ actionsProposed: 2, actionsExecuted: 0 });
        expect(service.getStatistics()).toMatchObject({ totalCycles: 1, rejectedPlans: 1, totalActions: 0 });

        const rejected = events[0];
        if (!(rejected instanceof ExecutionPlanRejected)) {
            throw new Error('expected an ExecutionPlanRejected event');
        }
        expect(rejected.violations).toEqual(['thermal']);
        expect(rejected.targets).toEqual(['CPU_PL2', 'GPU_TGP']);
    });

    it('should count conflicts resolved in a cycle whose plan was rejected', async () => {
        collect.mockReset();
        collect.mockResolvedValue(buildContext({ thermal: { cpuTempC: 95 } }));
        const service = createService([
            ScriptedAgent.proposing('PerformanceAgent', [
                createAction('proactive', ResourceTargets.CPU_PL2, ResourceValues.watts(130), 'Benchmark'),
            ]),
            ScriptedAgent.proposing('GamingAgent', [
                createAction('proactive', ResourceTargets.CPU_PL2, ResourceValues.watts(125), 'Game detected'),
            ]),
        ]);

        const report = await service.runCycle();

        expect(report.status).toBe('rejected');
        expect(report.plan?.conflicts).toHaveLength(1);
        expect(service.getStatistics()).toMatchObject({ rejectedPlans: 1, totalConflicts: 1, totalActions: 0 });
    });

    it('should leave out agents switched off by a feature flag', async () => {
        const propose = vi.fn(async () => AgentProposal.create('ThermalAgent', 'normal', [lowerPl2]));
        const service = createService(
            [new ScriptedAgent('ThermalAgent', propose), ScriptedAgent.proposing('GpuAgent', [lowerTgp])],
            { featureFlags: new FeatureFlags({ AGENT_THERMALAGENT: false }) }
        );

        const report = await service.runCycle();

        expect(propose).not.toHaveBeenCalled();
        expect(report.result?.executedActions).toEqual([{ ...lowerTgp, sourceAgent: 'GpuAgent' }]);
    });

    it('should leave out agents whose hardware is missing', async () => {
        const keyboard = ScriptedAgent.proposing('KeyboardAgent', [lowerTgp], ['keyboard_lighting']);
        const gpu = ScriptedAgent.proposing('GpuAgent', [lowerTgp], ['gpu_control']);
        const service = createService([keyboard, gpu]);

        await service.runCycle();

        expect(keyboard.results).toEqual([]);
        expect(gpu.results).toHaveLength(1);
        expect(observability.metrics.getCounter(MetricNames.AGENT_SKIPPED_TOTAL, { agent: 'KeyboardAgent' })).toBe(1);
    });

    it('should complete the cycle when an agent fails to process the result', async () => {
        const warn = vi.spyOn(observability.logger, 'warn');
        const grumpy = ScriptedAgent.proposing('GrumpyAgent', [lowerTgp]);
        vi.spyOn(grumpy, 'onExecuted').mockRejectedValue(new Error('state corrupted'));
        const service = createService([grumpy]);

        const report = await service.runCycle();

        expect(report.status).toBe('completed');
        expect(warn).toHaveBeenCalledWith('Agent failed to process execution result', {
            agentName: 'GrumpyAgent',
            error: 'state corrupted',
        });
    });

    it('should reuse the pre-execution snapshot when the second read fails', async () => {
        collect.mockReset();
        collect.mockResolvedValueOnce(contextBefore).mockRejectedValueOnce(new Error('EC busy'));
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])]);

        const report = await service.runCycle();

        expect(report.result?.contextAfter).toBe(contextBefore);
    });

    it('should read the post-execution snapshot from its own collector when given one', async () => {
        collect.mockReset();
        collect.mockResolvedValue(contextBefore);
        const after = vi.fn(async () => contextAfter);
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])], {
            postExecutionCollector: { collect: after },
        });

        const report = await service.runCycle();

        expect(collect).toHaveBeenCalledTimes(1);
        expect(after).toHaveBeenCalledTimes(1);
        expect(report.result?.contextBefore).toBe(contextBefore);
        expect(report.result?.contextAfter).toBe(contextAfter);
    });

    it('should warn when a cycle takes longer than its interval', async () => {
        const warn = vi.spyOn(observability.logger, 'warn');
        const stuck = new ScriptedAgent('StuckAgent', () => new Promise<IAgentProposal>(() => undefined));
        const service = createService([stuck], { agentTimeoutMs: 20, cycleIntervalMs: 5 });

        const report = await service.runCycle();

        expect(report.status).toBe('idle');
        expect(observability.metrics.getCounter(MetricNames.CYCLE_OVERRUNS_TOTAL)).toBe(1);
        expect(warn).toHaveBeenCalledWith(
            'Cycle overran its interval',
            expect.objectContaining({ cycleNumber: 1, cycleIntervalMs: 5 })
        );
    });

    it('should not report an overrun for a cycle inside its interval', async () => {
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])], { cycleIntervalMs: 60_000 });

        await service.runCycle();

        expect(observability.metrics.getCounter(MetricNames.CYCLE_OVERRUNS_TOTAL)).toBe(0);
    });

    it('should not fail the cycle when event delivery fails', async () => {
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])], {
            eventDispatcher: {
                dispatch: vi.fn(async () => {
                    throw new Error('subscriber down');
                }),
                subscribe: vi.fn(),
            },
        });

        const report = await service.runCycle();

        expect(report.status).toBe('completed');
    });

    it('should report an unexpected failure and accept the next cycle', async () => {
        vi.spyOn(executor, 'execute').mockRejectedValueOnce(new Error('executor crashed'));
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])]);

        const failed = await service.runCycle();
        expect(failed.status).toBe('failed');
        expect(failed.error).toBe('executor crashed');
        expect(service.isRunning).toBe(false);

        collect.mockResolvedValue(contextBefore);
        const next = await service.runCycle();
        expect(next.status).toBe('completed');
        expect(next.cycleNumber).toBe(2);
    });

    it('should trace every step of the cycle under one trace', async () => {
        const service = createService([ScriptedAgent.proposing('GpuAgent', [lowerTgp])]);

        await service.runCycle();

        const traces = observability.tracer.getTraces();
        expect(traces).toHaveLength(1);
        expect(traces[0].spans.map(s => s.name)).toEqual([
            SpanNames.CYCLE_RUN,
            SpanNames.CONTEXT_COLLECT,
            SpanNames.AGENT_PROPOSE,
            SpanNames.ARBITRATION_RESOLVE,
            SpanNames.SAFETY_VALIDATE,
            SpanNames.EXECUTION_APPLY,
            SpanNames.CONTEXT_COLLECT,
            SpanNames.AGENT_NOTIFY,
        ]);
    });

    it('should report uptime and the last cycle time', async () => {
        const service = createService([]);
        clock.advance(1_500);

        await service.runCycle();

        expect(service.getStatistics().uptimeMs).toBe(1_500);
        expect(service.getStatistics().lastCycleAt).toEqual(clock.now());
    });
});
