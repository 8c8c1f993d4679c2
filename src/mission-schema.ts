/**
 * Mission Schema - the configuration ontology for the drone mission.
 * Every tunable constant of the cost model and the decision rules lives here,
 * so the planner, the agent and the world all read the same values.
 */

export const MISSION_NS = "urn:sentinel-drone:mission#";

/**
 * SPARQL update that loads the TBox and the default configuration instances.
 */
export const LOAD_MISSION_ONTOLOGY = `
PREFIX rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>
PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
PREFIX owl: <http://www.w3.org/2002/07/owl#>
PREFIX xsd: <http://www.w3.org/2001/XMLSchema#>
PREFIX msn: <${MISSION_NS}>

INSERT DATA {
  msn:MissionConfig rdf:type owl:Class ;
      rdfs:label "Mission Config" ;
      rdfs:comment "Base class for mission parameter sets" .

  msn:EnergyConfig rdf:type owl:Class ;
      rdfs:subClassOf msn:MissionConfig ;
      rdfs:label "Energy Config" .

  msn:DecisionConfig rdf:type owl:Class ;
      rdfs:subClassOf msn:MissionConfig ;
      rdfs:label "Decision Config" .

  msn:PerceptionConfig rdf:type owl:Class ;
      rdfs:subClassOf msn:MissionConfig ;
      rdfs:label "Perception Config" .

  msn:DefaultEnergyConfig rdf:type msn:EnergyConfig ;
      rdfs:label "Default Energy" ;
      msn:moveCost "1"^^xsd:integer ;
      msn:urbanMoveCost "3"^^xsd:integer ;
      msn:collectCost "1"^^xsd:integer .

  msn:DefaultDecisionConfig rdf:type msn:DecisionConfig ;
      rdfs:label "Default Decision" ;
      msn:lowBatteryRatio "0.3"^^xsd:float ;
      msn:costPerStepEstimate "1.5"^^xsd:float ;
      msn:targetReward "100.0"^^xsd:float ;
      msn:targetPenalty "150.0"^^xsd:float ;
      msn:baseReward "50.0"^^xsd:float ;
      msn:basePenalty "100.0"^^xsd:float ;
      msn:urbanRiskFactor "0.85"^^xsd:float .

  msn:DefaultPerceptionConfig rdf:type msn:PerceptionConfig ;
      rdfs:label "Default Perception" ;
      msn:sampleRadius "1.0"^^xsd:float .
}
`;

export interface EnergyParameters {
  moveCost: number;
  urbanMoveCost: number;
  collectCost: number;
}

export interface DecisionParameters {
  // Fraction of capacity below which the utility comparison kicks in
  lowBatteryRatio: number;
  costPerStepEstimate: number;
  targetReward: number;
  targetPenalty: number;
  baseReward: number;
  basePenalty: number;
  // Multiplier on the continue-to-target utility when the target is urban
  urbanRiskFactor: number;
}

export interface PerceptionParameters {
  sampleRadius: number;
}

export interface MissionParameters {
  energy: EnergyParameters;
  decision: DecisionParameters;
  perception: PerceptionParameters;
}

export const DEFAULT_MISSION_PARAMETERS: MissionParameters = {
  energy: {
    moveCost: 1,
    urbanMoveCost: 3,
    collectCost: 1,
  },
  decision: {
    lowBatteryRatio: 0.3,
    costPerStepEstimate: 1.5,
    targetReward: 100,
    targetPenalty: 150,
    baseReward: 50,
    basePenalty: 100,
    urbanRiskFactor: 0.85,
  },
  perception: {
    sampleRadius: 1,
  },
};

/**
 * Parameter name -> configuration class that owns it.
 */
export const PARAMETER_OWNERS: Record<string, "EnergyConfig" | "DecisionConfig" | "PerceptionConfig"> = {
  moveCost: "EnergyConfig",
  urbanMoveCost: "EnergyConfig",
  collectCost: "EnergyConfig",
  lowBatteryRatio: "DecisionConfig",
  costPerStepEstimate: "DecisionConfig",
  targetReward: "DecisionConfig",
  targetPenalty: "DecisionConfig",
  baseReward: "DecisionConfig",
  basePenalty: "DecisionConfig",
  urbanRiskFactor: "DecisionConfig",
  sampleRadius: "PerceptionConfig",
};

/**
 * Lower bound of each parameter. Move costs of at least 1 keep the battery
 * strictly decreasing along every search transition.
 */
export const PARAMETER_BOUNDS: Record<string, { min: number; exclusive: boolean }> = {
  moveCost: { min: 1, exclusive: false },
  urbanMoveCost: { min: 1, exclusive: false },
  collectCost: { min: 0, exclusive: false },
  lowBatteryRatio: { min: 0, exclusive: true },
  costPerStepEstimate: { min: 0, exclusive: true },
  targetReward: { min: 0, exclusive: false },
  targetPenalty: { min: 0, exclusive: false },
  baseReward: { min: 0, exclusive: false },
  basePenalty: { min: 0, exclusive: false },
  urbanRiskFactor: { min: 0, exclusive: true },
  sampleRadius: { min: 0, exclusive: true },
};

export const LOAD_PARAMETERS_QUERY = `
PREFIX msn: <${MISSION_NS}>

SELECT
  ?moveCost ?urbanMoveCost ?collectCost
  ?lowBatteryRatio ?costPerStepEstimate ?targetReward ?targetPenalty
  ?baseReward ?basePenalty ?urbanRiskFactor
  ?sampleRadius
WHERE {
  ?energy a msn:EnergyConfig .
  ?energy msn:moveCost ?moveCost .
  ?energy msn:urbanMoveCost ?urbanMoveCost .
  ?energy msn:collectCost ?collectCost .

  ?decision a msn:DecisionConfig .
  ?decision msn:lowBatteryRatio ?lowBatteryRatio .
  ?decision msn:costPerStepEstimate ?costPerStepEstimate .
  ?decision msn:targetReward ?targetReward .
  ?decision msn:targetPenalty ?targetPenalty .
  ?decision msn:baseReward ?baseReward .
  ?decision msn:basePenalty ?basePenalty .
  ?decision msn:urbanRiskFactor ?urbanRiskFactor .

  ?perception a msn:PerceptionConfig .
  ?perception msn:sampleRadius ?sampleRadius .
}
LIMIT 1
`;
