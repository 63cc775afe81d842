// MQTT topic helpers for the LED controller bridge

export function commandTopic(deviceId: number): string {
  return `leds/${deviceId}/command`;
}

export function statusTopic(deviceId: number): string {
  return `leds/${deviceId}/status`;
}
