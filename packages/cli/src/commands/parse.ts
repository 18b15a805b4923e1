/**
 * Option and argument parsers shared by the holdback commands.
 *
 * Each parser is handed to commander as a custom argument processor and
 * throws commander's InvalidArgumentError, so a bad value is reported the
 * same way as an unknown option.
 */

import { InvalidArgumentError, Option } from 'commander';
import type { Command } from 'commander';
import { CALL_TYPES, CallType, parseCallType } from '@holdback/kernel';
import type { Identity, QueuedAction } from '@holdback/kernel';

const DECIMAL_PATTERN = /^(?:0|[1-9][0-9]*)$/;
const PAYLOAD_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

/** A non-negative integer that fits a JS number. */
export function parseInteger(raw: string): number {
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got '${raw}'.`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`Integer out of range: ${raw}.`);
  }
  return value;
}

/** An amount in the avatar's smallest unit. */
export function parseValue(raw: string): bigint {
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new InvalidArgumentError(`Expected a non-negative decimal amount, got '${raw}'.`);
  }
  return BigInt(raw);
}

/** Call data as 0x-prefixed hex; normalized to lowercase so it hashes the same however it was typed. */
export function parsePayload(raw: string): string {
  if (!PAYLOAD_PATTERN.test(raw)) {
    throw new InvalidArgumentError(`Payload must be 0x followed by whole bytes of hex, got '${raw}'.`);
  }
  return raw.toLowerCase();
}

export function parseCallTypeOption(raw: string): CallType {
  const callType = parseCallType(raw);
  if (callType === undefined) {
    throw new InvalidArgumentError(`Call type must be one of: ${CALL_TYPES.join(', ')}.`);
  }
  return callType;
}

/**
 * A clock reading in seconds, given either as an integer or as an ISO 8601
 * date. Used by `--at`.
 */
export function parseTimestamp(raw: string): number {
  if (DECIMAL_PATTERN.test(raw)) return parseInteger(raw);
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError(`Expected seconds since the epoch or an ISO 8601 date, got '${raw}'.`);
  }
  return Math.floor(ms / 1000);
}

// ---------------------------------------------------------------------------
// Action options
// ---------------------------------------------------------------------------

/** The options shared by `propose`, `hash` and `execute`. */
export interface ActionOptions {
  value: bigint;
  payload: string;
  callType: CallType;
}

export const ACTION_DEFAULTS: ActionOptions = {
  value: 0n,
  payload: '0x',
  callType: CallType.Call,
};

export function buildAction(to: Identity, options: ActionOptions): QueuedAction {
  return { to, value: options.value, payload: options.payload, callType: options.callType };
}

/** `--value`, `--payload` and `--call-type`, with their defaults. */
export function actionOptions(): Option[] {
  return [
    new Option('--value <amount>', 'amount in the smallest unit of the avatar')
      .argParser(parseValue)
      .default(ACTION_DEFAULTS.value, '0'),
    new Option('--payload <hex>', 'call data as 0x-prefixed hex')
      .argParser(parsePayload)
      .default(ACTION_DEFAULTS.payload),
    new Option('--call-type <type>', `how the avatar performs the call: ${CALL_TYPES.join(' or ')}`)
      .argParser(parseCallTypeOption)
      .default(ACTION_DEFAULTS.callType),
  ];
}

export function withActionOptions(command: Command): Command {
  for (const option of actionOptions()) command.addOption(option);
  return command;
}
