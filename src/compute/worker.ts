import { runTrialsTask, type SimulationTask } from './tasks/simulate.js';
import type { OutcomeTally } from '../games/blackjack/types.js';

export type ComputeRequest = { op: 'simulate.trials'; task: SimulationTask };

// piscina calls the default export once per queued request
export default function handleRequest(request: ComputeRequest): OutcomeTally {
    const { op } = request;
    if (op === 'simulate.trials') return runTrialsTask(request.task);
    throw new Error(`Unknown compute operation: ${String(op)}`);
}
