export type SimulationConfig = {
  massLarge: number;
  velocityLarge: number;
};

export type BlockLayout = {
  // Left edges, measured from the wall at x = 0.
  positionLarge: number;
  positionSmall: number;
  widthLarge: number;
  widthSmall: number;
};

export type SimulationState = BlockLayout & {
  readonly massLarge: number;
  readonly massSmall: number;
  velocityLarge: number;
  velocitySmall: number;
  collisionCount: number;
  finished: boolean;
};

export type SimulationSnapshot = Readonly<SimulationState>;

export type VelocityPair = {
  large: number;
  small: number;
};
