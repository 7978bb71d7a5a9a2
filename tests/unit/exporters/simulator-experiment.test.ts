import { describe, it, expect } from 'vitest';
import { toSimulatorExperiment } from '../../../src/application/services/exporters/simulator-experiment.js';
import { rest, cc, cv, eis, loop, tag, protocolWith } from '../../helpers/protocol-builders.js';
import { expectOk, expectErr } from '../../helpers/result-helpers.js';

describe('toSimulatorExperiment', () => {
  it('describes each step kind in simulator wording', () => {
    const protocol = protocolWith([
      cc({ rateC: 0.5, untilVoltageV: 4.2 }),
      cv({ voltageV: 4.2, untilTimeS: 7200, untilRateC: 0.05 }),
      cc({ rateC: -1, untilTimeS: 1800 }),
      cc({ currentMa: 2, untilTimeS: 45, untilVoltageV: 4.1 }),
      cv({ voltageV: 3, untilTimeS: 30, untilCurrentMa: 0.1 }),
      rest(600),
    ]);

    expect(expectOk(toSimulatorExperiment(protocol), 'all kinds')).toEqual([
      'Charge at 0.5C until 4.2 V',
      'Hold at 4.2 V for 2 hours until 0.05C',
      'Discharge at 1C for 30 minutes',
      'Charge at 2 mA for 45 seconds until 4.1 V',
      'Hold at 3 V for 30 seconds or until 0.1 mA',
      'Rest for 600 seconds',
    ]);
  });

  it('writes out every loop pass', () => {
    const protocol = protocolWith([tag('a'), cc({ currentMa: -1, untilTimeS: 60 }), rest(10), loop('a', 2), rest(5)]);

    expect(expectOk(toSimulatorExperiment(protocol), 'loop')).toEqual([
      'Discharge at 1 mA for 1 minutes',
      'Rest for 10 seconds',
      'Discharge at 1 mA for 1 minutes',
      'Rest for 10 seconds',
      'Rest for 5 seconds',
    ]);
  });

  it('rejects impedance sweeps', () => {
    const error = expectErr(toSimulatorExperiment(protocolWith([rest(), eis()])), 'impedance');

    expect(error).toEqual({
      _tag: 'UnsupportedStep',
      kind: 'impedance_sweep',
      format: 'simulator experiment',
      position: 2,
      message: "Step kind 'impedance_sweep' at position 2 is not supported by the simulator experiment exporter.",
    });
  });

  it('honours the unroll ceiling', () => {
    const protocol = protocolWith([rest(), loop(1, 10)]);

    expect(expectErr(toSimulatorExperiment(protocol, { maxIterations: 5 }), 'ceiling')).toMatchObject({
      _tag: 'RunawayExpansion',
      maxIterations: 5,
      stepsTaken: 6,
    });
  });
});
