import {
  EventService,
  createActionEvent,
  createDecisionEvent,
  createMilestoneEvent,
  createStateEvent,
} from './application/index.js';
import {
  EventWriter,
  createLogger,
  loadConfig,
  writerOptionsFromConfig,
} from './infrastructure/index.js';

/**
 * Writes a two-turn sample simulation under EVENTS_OUTPUT_ROOT, then reads
 * it back through the event service.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL);
  const simulationId = `demo-${Date.now()}`;

  const writer = new EventWriter(writerOptionsFromConfig(config, simulationId, log));
  writer.start();

  const start = createMilestoneEvent({
    simulation_id: simulationId,
    turn_number: 0,
    milestone_type: 'simulation_start',
    description: 'Demo simulation started',
  });
  writer.emit(start);

  let previousTurnEnd = start.event_id;
  for (let turn = 1; turn <= 2; turn++) {
    const turnStart = createMilestoneEvent({
      simulation_id: simulationId,
      turn_number: turn,
      milestone_type: 'turn_start',
      caused_by: [previousTurnEnd],
    });
    const decision = createDecisionEvent({
      simulation_id: simulationId,
      turn_number: turn,
      agent_id: 'agent_alpha',
      decision_type: 'investment',
      old_value: 0,
      new_value: 100 * turn,
      caused_by: [turnStart.event_id],
    });
    const trade = createActionEvent({
      simulation_id: simulationId,
      turn_number: turn,
      agent_id: 'agent_alpha',
      action_type: 'trade',
      action_payload: { partner: 'agent_beta', amount: 50 * turn },
      caused_by: [decision.event_id],
    });
    const wealth = createStateEvent({
      simulation_id: simulationId,
      turn_number: turn,
      agent_id: 'agent_alpha',
      variable_name: 'wealth',
      old_value: 1000 + 50 * (turn - 1),
      new_value: 1000 + 50 * turn,
      scope: 'agent',
      caused_by: [trade.event_id],
    });
    const turnEnd = createMilestoneEvent({
      simulation_id: simulationId,
      turn_number: turn,
      milestone_type: 'turn_end',
      // STATE is below the default verbosity, so link the turn to the trade.
      caused_by: [trade.event_id],
    });

    for (const event of [turnStart, decision, trade, wealth, turnEnd]) writer.emit(event);
    previousTurnEnd = turnEnd.event_id;
  }

  await writer.stop(config.EVENT_STOP_TIMEOUT_MS);

  const service = new EventService({ outputRoot: config.EVENTS_OUTPUT_ROOT, logger: log });
  const page = await service.getFilteredEvents(simulationId, { event_types: ['ACTION', 'DECISION'] });
  const chain = await service.getCausalityChain(simulationId, previousTurnEnd, 3);
  const report = await service.verifyCausality(simulationId);

  log.info(
    {
      simulationId,
      dropped: writer.droppedCount,
      agentEvents: page.total,
      upstream: chain?.upstream.map((e) => `${e.event_type}:${e.event_id}`) ?? [],
      causalityValid: report.valid,
    },
    'Demo simulation written and queried',
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: demo failed', err);
  process.exit(1);
});
