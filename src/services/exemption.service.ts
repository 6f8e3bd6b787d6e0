import { GLOBAL_PROPERTY_ID, PARAM_EXEMPT_NUMBERS, splitList } from "../domain/mapping";
import { PropertyDirectory } from "../domain/repositories";

export async function isExemptNumber(
  properties: PropertyDirectory,
  propertyId: number,
  dialedDigits: string
): Promise<boolean> {
  const scoped = await properties.getParameter(propertyId, PARAM_EXEMPT_NUMBERS);
  const value = scoped ?? (await properties.getParameter(GLOBAL_PROPERTY_ID, PARAM_EXEMPT_NUMBERS));
  if (!value || !dialedDigits) return false;
  return splitList(value).includes(dialedDigits.trim());
}
