import { asRecord, childRecords, parseXmlDocument, readString } from "./xml";

export interface SumoConfigFiles {
  netFile: string | null;
  routeFiles: string[];
}

export function parseVehicleTypes(xml: string): string[] {
  const document = parseXmlDocument(xml, "Route file");
  const routes = asRecord(document.routes);
  if (!routes) {
    throw new Error("Route file has no <routes> element.");
  }
  const ids: string[] = [];
  for (const vType of childRecords(routes, "vType")) {
    const id = readString(vType, "id");
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

export function parseSumoConfig(xml: string): SumoConfigFiles {
  const document = parseXmlDocument(xml, "Configuration file");
  const configuration = asRecord(document.configuration) ?? asRecord(document.sumoConfiguration);
  if (!configuration) {
    throw new Error("Configuration file has no <configuration> element.");
  }
  const input = asRecord(configuration.input);
  if (!input) {
    return { netFile: null, routeFiles: [] };
  }
  const netEntry = asRecord(input["net-file"]);
  const routeEntry = asRecord(input["route-files"]);
  const routeValue = routeEntry ? readString(routeEntry, "value") : null;
  return {
    netFile: netEntry ? readString(netEntry, "value") : null,
    routeFiles: routeValue
      ? routeValue
          .split(",")
          .map((name) => name.trim())
          .filter(Boolean)
      : []
  };
}
