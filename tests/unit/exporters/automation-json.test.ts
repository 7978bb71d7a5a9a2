import { describe, it, expect } from 'vitest';
import {
  toAutomationDocument,
  toAutomationJson,
  DEFAULT_AUTOMATION_OUTPUT_PATH,
} from '../../../src/application/services/exporters/automation-json.js';
import { rest, cc, cv, eis, loop, tag, protocolWith } from '../../helpers/protocol-builders.js';
import { expectOk, expectErr } from '../../helpers/result-helpers.js';

const measured = { device: 'MPG2', measure_every_dt: 10, I_range: '10 mA', E_range: '+-5.0 V' };

const method = [
  tag('a'),
  cc({ rateC: 0.5, untilVoltageV: 4.2 }),
  cv({ voltageV: 4.2, untilTimeS: 3600, untilRateC: 0.05 }),
  rest(60),
  loop('a', 3),
  cc({ currentMa: -500, untilTimeS: 100, untilVoltageV: 3 }),
];

describe('toAutomationDocument', () => {
  it('maps steps to device techniques and loops to goto jumps', () => {
    const doc = expectOk(toAutomationDocument(protocolWith(method)), 'export');

    expect(doc).toEqual({
      version: '0.1',
      sample: { name: 'cell-01', capacity_mAh: 2 },
      method: [
        { ...measured, technique: 'constant_current', current: '0.5C', limit_voltage_max: 4.2 },
        { ...measured, technique: 'constant_voltage', voltage: 4.2, time: 3600, limit_current_min: '0.05C' },
        { ...measured, technique: 'open_circuit_voltage', time: 60 },
        { device: 'MPG2', technique: 'loop', goto: 0, n_gotos: 2 },
        { ...measured, technique: 'constant_current', current: -0.5, time: 100, limit_voltage_min: 3 },
      ],
      tomato: {
        unlock_when_done: true,
        verbosity: 'DEBUG',
        output: { path: DEFAULT_AUTOMATION_OUTPUT_PATH, prefix: 'cell-01' },
      },
    });
  });

  it('writes discharge C-rates with a D suffix', () => {
    const doc = expectOk(toAutomationDocument(protocolWith([cc({ rateC: -0.25, untilVoltageV: 3 })])), 'discharge');

    expect(doc.method[0]).toMatchObject({ current: '0.25D', limit_voltage_min: 3 });
  });

  it('needs a real sample name', () => {
    const protocol = protocolWith([rest()], { name: '$NAME', capacityMah: 2 });

    expect(expectErr(toAutomationDocument(protocol), 'placeholder name')).toEqual({
      _tag: 'MissingSampleName',
      message: 'If using a blank sample name or the $NAME placeholder, a sample name must be provided.',
    });
    expect(expectOk(toAutomationDocument(protocol, { sampleName: 'cell-02' }), 'override').sample.name).toBe('cell-02');
  });

  it('needs a capacity when C-rates are used, counting positions as written', () => {
    const protocol = protocolWith(method, { name: 'cell-01' });

    expect(expectErr(toAutomationDocument(protocol), 'no capacity')).toMatchObject({
      _tag: 'MissingCapacity',
      positions: [2, 3],
    });
    expect(expectOk(toAutomationDocument(protocol, { capacityMah: 3 }), 'override').sample.capacity_mAh).toBe(3);
  });

  it('uses the given data path', () => {
    const doc = expectOk(toAutomationDocument(protocolWith([rest()]), { outputPath: '/data/runs' }), 'path');

    expect(doc.tomato.output).toEqual({ path: '/data/runs', prefix: 'cell-01' });
  });

  it('rejects impedance sweeps', () => {
    expect(expectErr(toAutomationDocument(protocolWith([rest(), eis()])), 'impedance')).toMatchObject({
      _tag: 'UnsupportedStep',
      format: 'lab-automation JSON',
      position: 2,
    });
  });
});

describe('toAutomationJson', () => {
  it('serializes with 4-space indentation', () => {
    const json = expectOk(toAutomationJson(protocolWith([rest(5)])), 'json');

    expect(json.split('\n').slice(0, 2)).toEqual(['{', '    "version": "0.1",']);
    expect(JSON.parse(json)).toEqual(expectOk(toAutomationDocument(protocolWith([rest(5)])), 'document'));
  });
});
