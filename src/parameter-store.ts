/**
 * MissionParameterStore - in-memory SPARQL store holding the mission ontology.
 *
 * The cost model and the decision rules never hardcode their constants; they
 * receive a MissionParameters object read from here. The driver may override
 * individual values before the mission starts.
 */

import { Store } from "oxigraph";
import {
  DEFAULT_MISSION_PARAMETERS,
  LOAD_MISSION_ONTOLOGY,
  LOAD_PARAMETERS_QUERY,
  MISSION_NS,
  PARAMETER_BOUNDS,
  PARAMETER_OWNERS,
  type MissionParameters,
} from "./mission-schema";

type Bindings = Map<string, string>;

/**
 * Narrow a raw SELECT result into variable -> lexical value maps.
 */
function readBindings(raw: unknown): Bindings[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const rows: Bindings[] = [];
  for (const solution of raw) {
    if (!(solution instanceof Map)) continue;
    const entries: Iterable<[unknown, unknown]> = solution;
    const row: Bindings = new Map();
    for (const [name, term] of entries) {
      if (typeof name === "string" && typeof term === "object" && term !== null && "value" in term) {
        const value = term.value;
        if (typeof value === "string") {
          row.set(name, value);
        }
      }
    }
    rows.push(row);
  }
  return rows;
}

export class MissionParameterStore {
  private store: Store;
  private _params: MissionParameters | null = null;

  constructor() {
    this.store = new Store();
    this.initializeOntology();
  }

  /**
   * Get mission parameters from the ontology (cached until the next override).
   */
  get params(): MissionParameters {
    if (!this._params) {
      this._params = this.loadParameters();
    }
    return this._params;
  }

  private initializeOntology(): void {
    this.store.update(LOAD_MISSION_ONTOLOGY);
    this._params = null;
  }

  private loadParameters(): MissionParameters {
    const results = readBindings(this.store.query(LOAD_PARAMETERS_QUERY));

    if (results.length === 0) {
      console.warn("[Parameters] No mission parameters found in ontology, using defaults");
      return structuredClone(DEFAULT_MISSION_PARAMETERS);
    }

    const r = results[0];
    const getFloat = (key: string, def: number) => {
      const parsed = parseFloat(r.get(key) ?? "");
      return Number.isFinite(parsed) ? parsed : def;
    };
    const d = DEFAULT_MISSION_PARAMETERS;

    return {
      energy: {
        moveCost: getFloat("moveCost", d.energy.moveCost),
        urbanMoveCost: getFloat("urbanMoveCost", d.energy.urbanMoveCost),
        collectCost: getFloat("collectCost", d.energy.collectCost),
      },
      decision: {
        lowBatteryRatio: getFloat("lowBatteryRatio", d.decision.lowBatteryRatio),
        costPerStepEstimate: getFloat("costPerStepEstimate", d.decision.costPerStepEstimate),
        targetReward: getFloat("targetReward", d.decision.targetReward),
        targetPenalty: getFloat("targetPenalty", d.decision.targetPenalty),
        baseReward: getFloat("baseReward", d.decision.baseReward),
        basePenalty: getFloat("basePenalty", d.decision.basePenalty),
        urbanRiskFactor: getFloat("urbanRiskFactor", d.decision.urbanRiskFactor),
      },
      perception: {
        sampleRadius: getFloat("sampleRadius", d.perception.sampleRadius),
      },
    };
  }

  /**
   * Replace one parameter value in every configuration instance that carries it.
   */
  setParameter(name: string, value: number): void {
    const owner = PARAMETER_OWNERS[name];
    if (!owner) {
      throw new Error(`Unknown mission parameter: ${name}`);
    }
    if (!Number.isFinite(value)) {
      throw new Error(`Parameter ${name} must be a finite number, got ${value}`);
    }
    const bound = PARAMETER_BOUNDS[name];
    if (bound.exclusive ? value <= bound.min : value < bound.min) {
      const limit = bound.exclusive ? "greater than" : "at least";
      throw new Error(`Parameter ${name} must be ${limit} ${bound.min}, got ${value}`);
    }

    this.store.update(`
      PREFIX msn: <${MISSION_NS}>
      PREFIX xsd: <http://www.w3.org/2001/XMLSchema#>

      DELETE { ?config msn:${name} ?old }
      INSERT { ?config msn:${name} "${value}"^^xsd:float }
      WHERE {
        ?config a msn:${owner} .
        ?config msn:${name} ?old .
      }
    `);

    this._params = null;
    console.log(`[Parameters] ${name} = ${value}`);
  }

  /**
   * Drop every configuration instance, leaving only the class definitions.
   */
  clearConfigurations(): void {
    this.store.update(`
      PREFIX msn: <${MISSION_NS}>
      PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>

      DELETE { ?config ?p ?o }
      WHERE {
        ?config a ?type .
        ?type rdfs:subClassOf msn:MissionConfig .
        ?config ?p ?o .
      }
    `);
    this._params = null;
  }

  /**
   * List every configuration instance with its properties, for the driver's banner.
   */
  getAllConfigurations(): Array<{ configId: string; properties: Array<{ name: string; value: string }> }> {
    const results = readBindings(
      this.store.query(`
        PREFIX msn: <${MISSION_NS}>
        PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
        PREFIX rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>

        SELECT ?config ?prop ?value
        WHERE {
          ?config a ?type .
          ?type rdfs:subClassOf msn:MissionConfig .
          ?config ?prop ?value .
          FILTER(?prop != rdf:type)
          FILTER(?prop != rdfs:label)
        }
        ORDER BY ?config ?prop
      `)
    );

    const configMap = new Map<string, Array<{ name: string; value: string }>>();
    for (const r of results) {
      const configId = (r.get("config") ?? "").replace(MISSION_NS, "");
      const name = (r.get("prop") ?? "").replace(MISSION_NS, "");
      const value = r.get("value") ?? "";

      const properties = configMap.get(configId) ?? [];
      properties.push({ name, value });
      configMap.set(configId, properties);
    }

    return Array.from(configMap, ([configId, properties]) => ({ configId, properties }));
  }
}
