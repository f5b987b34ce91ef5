// Domain models for box-score rows and the payloads served from them

export type PlayerGameRow = {
  gameId: string;
  gameDate: string;
  teamId: number;
  teamName: string;
  teamTricode: string; // 3-letter
  personId: number;
  personName: string;
  position: string;
  minutes: string; // "MM:SS" as published
  fieldGoalsMade: number;
  fieldGoalsAttempted: number;
  threePointersMade: number;
  threePointersAttempted: number;
  freeThrowsMade: number;
  freeThrowsAttempted: number;
  reboundsOffensive: number;
  reboundsDefensive: number;
  reboundsTotal: number;
  assists: number;
  steals: number;
  blocks: number;
  turnovers: number;
  foulsPersonal: number;
  points: number;
  plusMinusPoints: number;
};

export type BoxScoreTable = {
  rows: readonly PlayerGameRow[];
  source: string;
  unknownColumns: string[];
};

export type GameInfo = {
  gameId: string;
  game_date: string;
  teams: string[];
};

export type PlayerStats = {
  gameId: string;
  teamId: number;
  teamName: string;
  teamTricode: string;
  personId: number;
  personName: string;
  position: string;
  minutes: string;
  points: number;
  rebounds: number;
  assists: number;
  steals: number;
  blocks: number;
  turnovers: number;
  true_shooting: number;
  efficiency: number;
  plusMinus: number;
};

export type ChartData = {
  labels: string[];
  datasets: {
    points: number[];
    true_shooting: number[];
    momentum: number[];
  };
};
