export interface Sensor {
  id: number;
  device: string | null;
  probe: string | null;
  group: string | null;
  name: string | null;
  lastValue: string | null;
  lastValueAlt: string | null;
  value: number | null;
}

export interface Channel {
  sensorId: number;
  id: number | null;
  name: string | null;
  unit: string | null;
  lastValue: string | null;
  lastValueRaw: unknown;
  lastValueAlt: string | null;
  value: number | null;
}

export interface SensorSource {
  fetchSensors(signal?: AbortSignal): Promise<Sensor[]>;
  fetchChannels(sensorId: number, signal?: AbortSignal): Promise<Channel[]>;
}

export type SensorLabels = {
  sensor_id: string;
  device: string;
  sensor: string;
  probe: string;
  group: string;
};

export type ChannelLabels = SensorLabels & {
  channel: string;
  unit: string;
};
