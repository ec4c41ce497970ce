/**
 * PmdCommands.ts
 *
 * Builds and encodes control point commands. A command on the wire is
 * [opcode][measurement_type] followed, for Start only, by one block per
 * setting: [setting_kind][count][count x uint16 LE].
 */

import { ControlOpcode, MeasurementType, MEASUREMENT_NAMES, OPCODE_NAMES, formatBytes } from './PmdConstants';
import { ControlCommand, MeasurementSetting } from './PmdTypes';
import { EncodeError, ProtocolError } from './PmdErrors';
import { pmdLogger } from './PmdLogger';

const MAX_SETTING_VALUE = 0xffff;
const MAX_VALUES_PER_SETTING = 0xff;

export class PmdCommands {
  /**
   * Request the settings the device supports for a measurement type
   */
  static getSettings(measurement: MeasurementType): ControlCommand {
    return PmdCommands.build(ControlOpcode.GetSettings, measurement, []);
  }

  /**
   * Start a measurement; each setting should carry its selected value
   */
  static start(measurement: MeasurementType, settings: readonly MeasurementSetting[]): ControlCommand {
    return PmdCommands.build(ControlOpcode.Start, measurement, settings);
  }

  static stop(measurement: MeasurementType): ControlCommand {
    return PmdCommands.build(ControlOpcode.Stop, measurement, []);
  }

  private static build(
    opcode: ControlOpcode,
    measurement: MeasurementType,
    settings: readonly MeasurementSetting[]
  ): ControlCommand {
    const frozen = settings.map(setting => Object.freeze({
      ...setting,
      values: Object.freeze([...setting.values]),
    }));
    return Object.freeze({ opcode, measurement, settings: Object.freeze(frozen) });
  }

  /**
   * Encodes a command for the control point.
   * Start writes the selected value of each setting, or all of its values when none is selected.
   * @throws EncodeError on a Start without settings or a value that does not fit 16 bits
   * @throws ProtocolError UnsupportedSetting if a selected value is not one of the setting's values
   */
  static encode(command: ControlCommand): Uint8Array {
    if (command.opcode === ControlOpcode.Start && command.settings.length === 0) {
      throw new EncodeError(
        'EmptySettingList',
        `Start ${MEASUREMENT_NAMES[command.measurement]} needs at least one setting`
      );
    }

    const bytes: number[] = [command.opcode, command.measurement];

    if (command.opcode === ControlOpcode.Start) {
      for (const setting of command.settings) {
        if (setting.selected !== undefined && !setting.values.includes(setting.selected)) {
          throw new ProtocolError(
            'UnsupportedSetting',
            `Selected value ${setting.selected} of setting 0x${setting.kind.toString(16)} is not among [${setting.values.join(', ')}]`
          );
        }
        const values = setting.selected !== undefined ? [setting.selected] : setting.values;

        if (values.length === 0 || values.length > MAX_VALUES_PER_SETTING) {
          throw new EncodeError('ValueOutOfRange', `Setting 0x${setting.kind.toString(16)} has ${values.length} values`);
        }

        bytes.push(setting.kind, values.length);
        for (const value of values) {
          if (!Number.isInteger(value) || value < 0 || value > MAX_SETTING_VALUE) {
            throw new EncodeError('ValueOutOfRange', `Setting value ${value} does not fit in 16 bits`);
          }
          bytes.push(value & 0xff, (value >> 8) & 0xff);
        }
      }
    }

    const buffer = Uint8Array.from(bytes);
    pmdLogger.debug(
      `${OPCODE_NAMES[command.opcode]} ${MEASUREMENT_NAMES[command.measurement]} command: ${formatBytes(buffer)}`,
      undefined,
      'CODEC'
    );
    return buffer;
  }
}

export const encodeCommand = (command: ControlCommand): Uint8Array => PmdCommands.encode(command);
