import { UNKNOWN_LOCATION_LABEL, UNOCCUPIED_ROOM_LABEL } from "../domain/mapping";
import { ExtensionDirectory } from "../domain/repositories";
import { AlertContext } from "../domain/types";

export async function resolveAlertContext(
  extensions: ExtensionDirectory,
  propertyId: number,
  extension: string
): Promise<AlertContext> {
  const given = await extensions.getExtension(propertyId, extension);

  // Secondary extensions map to their declared primary for location purposes
  let primaryExtension = extension;
  let primary = given;
  if (given?.primaryExtension && given.primaryExtension !== extension) {
    primaryExtension = given.primaryExtension;
    primary = await extensions.getExtension(propertyId, primaryExtension);
  }

  const roomNumber = primary?.roomNumber || null;
  if (roomNumber) {
    const stay = await extensions.findCurrentOccupant(propertyId, roomNumber);
    if (stay) {
      return {
        primaryExtension,
        roomNumber,
        guestId: stay.guestId,
        guestName: stay.guestName,
        extensionName: primary?.name ?? null,
        occupancy: "occupied",
        locationResolved: true,
        displayName: stay.guestName,
      };
    }
    return {
      primaryExtension,
      roomNumber,
      guestId: null,
      guestName: null,
      extensionName: primary?.name ?? null,
      occupancy: "unoccupied",
      locationResolved: true,
      displayName: UNOCCUPIED_ROOM_LABEL,
    };
  }

  const extensionName = primary?.name || given?.name || null;
  if (extensionName) {
    return {
      primaryExtension,
      roomNumber: null,
      guestId: null,
      guestName: null,
      extensionName,
      occupancy: "extension-only",
      locationResolved: true,
      displayName: extensionName,
    };
  }

  return {
    primaryExtension,
    roomNumber: null,
    guestId: null,
    guestName: null,
    extensionName: null,
    occupancy: "no-location",
    locationResolved: false,
    displayName: UNKNOWN_LOCATION_LABEL,
  };
}
