import * as hap from "hap-nodejs";
import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import {
  type CoverState,
  COVER_CLOSING,
  COVER_OPENING,
} from "../shared/cover-state.ts";
import type { CoverEvent, CoverController } from "./cover-controller.ts";

function currentPosition(state: CoverState): number {
  // HomeKit has no notion of an unknown position
  return Math.round(state.currentPosition ?? 0);
}

function positionState(state: CoverState): number {
  switch (state.positionState) {
    case COVER_CLOSING:
      return hap.Characteristic.PositionState.DECREASING;
    case COVER_OPENING:
      return hap.Characteristic.PositionState.INCREASING;
    default:
      return hap.Characteristic.PositionState.STOPPED;
  }
}

function communicationFailure(
  logger: Logger,
  name: string,
  err: unknown
): hap.HapStatusError {
  logger.error(
    `HomeKit command for ${name} failed: ${
      err instanceof Error ? err.message : String(err)
    }`
  );
  return new hap.HapStatusError(hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
}

export function coverAccessory(
  coverController: CoverController,
  logger: Logger
): hap.Accessory {
  const accessoryUUID = hap.uuid.generate(
    `covertime:accessories:${coverController.id}`
  );
  const cover = new hap.Accessory(coverController.name, accessoryUUID);

  cover
    .getService(hap.Service.AccessoryInformation)
    ?.setCharacteristic(hap.Characteristic.Manufacturer, config.MANUFACTURER)
    .setCharacteristic(hap.Characteristic.Model, config.MODEL)
    .setCharacteristic(hap.Characteristic.SerialNumber, coverController.id);

  const service = cover.addService(
    hap.Service.WindowCovering,
    coverController.name
  );

  service
    .getCharacteristic(hap.Characteristic.CurrentPosition)
    .onGet(() => currentPosition(coverController.getState()));

  service
    .getCharacteristic(hap.Characteristic.TargetPosition)
    .onGet(() => Math.round(coverController.getTargetPosition()))
    .onSet(async (value: hap.CharacteristicValue) => {
      if (typeof value !== "number") {
        throw new hap.HapStatusError(hap.HAPStatus.INVALID_VALUE_IN_REQUEST);
      }
      try {
        await coverController.setTargetPosition(value);
      } catch (err) {
        throw communicationFailure(logger, coverController.name, err);
      }
    });

  service
    .getCharacteristic(hap.Characteristic.PositionState)
    .onGet(() => positionState(coverController.getState()));

  service
    .getCharacteristic(hap.Characteristic.HoldPosition)
    .onSet(async (value: hap.CharacteristicValue) => {
      if (value !== true && value !== 1) {
        return;
      }
      try {
        await coverController.stop();
      } catch (err) {
        throw communicationFailure(logger, coverController.name, err);
      }
    });

  coverController.on("change", ({ state }: CoverEvent) => {
    service
      .getCharacteristic(hap.Characteristic.CurrentPosition)
      .updateValue(currentPosition(state));
    service
      .getCharacteristic(hap.Characteristic.TargetPosition)
      .updateValue(Math.round(coverController.getTargetPosition()));
    service
      .getCharacteristic(hap.Characteristic.PositionState)
      .updateValue(positionState(state));
  });

  return cover;
}

export default function coverBridge(
  coverControllers: CoverController[],
  logger: Logger
): hap.Bridge {
  const bridge = new hap.Bridge(
    "covertime",
    hap.uuid.generate("covertime:bridge")
  );
  bridge
    .getService(hap.Service.AccessoryInformation)
    ?.setCharacteristic(hap.Characteristic.Manufacturer, config.MANUFACTURER)
    .setCharacteristic(hap.Characteristic.Model, config.MODEL);

  for (const coverController of coverControllers) {
    bridge.addBridgedAccessory(coverAccessory(coverController, logger));
  }
  return bridge;
}
