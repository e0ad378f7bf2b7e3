import { Chalk } from 'chalk';
import type {
  DerivedConstants,
  MotorCharacteristics,
  MotorModel,
  MotorParameters,
  OperatingPoint
} from '../motors/index.js';
import { formatQuantity, roundDeep } from '../utils/formatNumber.js';

/**
 * Everything the CLI prints, as plain data
 */
export interface MotorReport {
  motor: string;
  parameters: Omit<MotorParameters, 'name'>;
  derived: DerivedConstants;
  characteristics: MotorCharacteristics;
  operatingPoint?: OperatingPoint;
  /** Terminal voltage for the requested current and speed */
  requiredVoltage?: number;
  currentForTorque?: { torque: number; current: number };
  curve?: { voltage: number; points: OperatingPoint[] };
}

export interface ReportQueries {
  current?: number;
  voltage?: number;
  speed?: number;
  torque?: number;
  curve?: number;
}

export interface TextReportOptions {
  precision: number;
  color: boolean;
}

/** label, value, unit */
type Row = readonly [string, number | null, string];

const LABEL_WIDTH = 27;
const COLUMN_WIDTH = 12;

export function buildReport(model: MotorModel, queries: ReportQueries): MotorReport {
  const { name: _name, ...parameters } = model.parameters;
  const voltage = queries.voltage ?? model.parameters.nominalVoltage;

  const report: MotorReport = {
    motor: model.name,
    parameters,
    derived: { ...model.derived },
    characteristics: { ...model.characteristics }
  };

  if (queries.current !== undefined) {
    report.operatingPoint = model.operatingPoint(queries.current, voltage);
    if (queries.speed !== undefined) {
      report.requiredVoltage = model.voltageForOperatingPoint(queries.current, queries.speed);
    }
  }

  if (queries.torque !== undefined) {
    report.currentForTorque = {
      torque: queries.torque,
      current: model.currentForTorque(queries.torque)
    };
  }

  if (queries.curve !== undefined) {
    report.curve = { voltage, points: model.torqueSpeedCurve(queries.curve, voltage) };
  }

  return report;
}

export function formatJsonReport(report: MotorReport, precision: number): string {
  return JSON.stringify(roundDeep(report, precision), null, 2);
}

function parameterRows(p: MotorReport['parameters']): Row[] {
  return [
    ['nominal voltage', p.nominalVoltage, 'V'],
    ['rated power', p.ratedPower, 'W'],
    ['terminal resistance', p.resistance, 'Ω'],
    ['terminal inductance', p.inductance, 'H'],
    ['no-load current', p.noLoadCurrent, 'A'],
    ['no-load speed', p.noLoadSpeed, 'rad/s'],
    ['rotor inertia', p.rotorInertia, 'kg·m²']
  ];
}

function derivedRows(d: DerivedConstants): Row[] {
  return [
    ['torque constant', d.torqueConstant, 'N·m/A'],
    ['back-EMF constant', d.backEmfConstant, 'V·s/rad'],
    ['stall current', d.stallCurrent, 'A'],
    ['stall torque', d.stallTorque, 'N·m'],
    ['electrical time constant', d.electricalTimeConstant, 's'],
    ['mechanical time constant', d.mechanicalTimeConstant, 's']
  ];
}

function characteristicRows(c: MotorCharacteristics): Row[] {
  return [
    ['speed constant', c.speedConstant, 'rad/(V·s)'],
    ['motor constant', c.motorConstant, 'N·m/√W'],
    ['short-circuit damping', c.shortCircuitDamping, 'N·m·s/rad'],
    ['max continuous current', c.maxContinuousCurrent, 'A'],
    ['max continuous torque', c.maxContinuousTorque, 'N·m'],
    ['current at max power', c.maxMechanicalPowerCurrent, 'A'],
    ['max mechanical power', c.maxMechanicalPower, 'W'],
    ['current at max efficiency', c.maxEfficiencyCurrent, 'A'],
    ['max efficiency', c.maxEfficiency, '']
  ];
}

function operatingPointRows(point: OperatingPoint): Row[] {
  return [
    ['current', point.current, 'A'],
    ['voltage', point.voltage, 'V'],
    ['speed', point.speed, 'rad/s'],
    ['torque', point.torque, 'N·m'],
    ['input power', point.inputPower, 'W'],
    ['output power', point.outputPower, 'W'],
    ['efficiency', point.efficiency, '']
  ];
}

export function formatTextReport(report: MotorReport, options: TextReportOptions): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const { precision } = options;

  const formatRow = ([label, value, unit]: Row): string =>
    `  ${label.padEnd(LABEL_WIDTH)}${value === null ? 'n/a' : formatQuantity(value, precision, unit)}`;

  const section = (title: string, rows: Row[]): string[] => [chalk.bold(title), ...rows.map(formatRow)];

  const lines: string[] = [
    chalk.bold.cyan(report.motor),
    '',
    ...section('Nameplate', parameterRows(report.parameters)),
    '',
    ...section('Derived constants', derivedRows(report.derived)),
    '',
    ...section('Characteristics', characteristicRows(report.characteristics))
  ];

  const point = report.operatingPoint;
  if (point) {
    const rows = operatingPointRows(point);
    if (report.requiredVoltage !== undefined) {
      rows.push(['required voltage', report.requiredVoltage, 'V']);
    }
    lines.push('', ...section('Operating point', rows));
    if (point.efficiency !== null && !point.efficiencyInRange) {
      lines.push(chalk.yellow('  ! efficiency outside [0, 1]: operating point is inconsistent with the model'));
    }
  }

  if (report.currentForTorque) {
    lines.push(
      '',
      ...section('Current for torque', [
        ['torque', report.currentForTorque.torque, 'N·m'],
        ['current', report.currentForTorque.current, 'A']
      ])
    );
  }

  if (report.curve) {
    const header = ['I [A]', 'τ [N·m]', 'ω [rad/s]', 'P_out [W]', 'η'];
    lines.push(
      '',
      chalk.bold(`Torque-speed curve (V = ${formatQuantity(report.curve.voltage, precision, 'V')})`),
      header.map(cell => cell.padStart(COLUMN_WIDTH)).join('')
    );
    for (const p of report.curve.points) {
      const cells = [p.current, p.torque, p.speed, p.outputPower, p.efficiency];
      lines.push(
        cells
          .map(cell => (cell === null ? 'n/a' : formatQuantity(cell, precision)).padStart(COLUMN_WIDTH))
          .join('')
      );
    }
  }

  return lines.join('\n');
}
