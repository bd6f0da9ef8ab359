import WebSocket from 'ws';

/**
 * Connect to the notification stream and hand every JSON message to `onEvent`.
 * Resolves when the server closes the stream or `onEvent` calls `stop`.
 */
export function listenForEvents(
  url: string,
  onEvent: (event: unknown, stop: () => void) => void,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    const stop = (): void => {
      ws.close();
    };

    ws.on('message', (data) => {
      let event: unknown;
      try {
        event = JSON.parse(data.toString());
      } catch {
        // Ignore non-JSON messages
        return;
      }
      onEvent(event, stop);
    });

    ws.on('close', () => {
      resolve();
    });

    ws.on('error', (err) => {
      reject(err);
    });
  });
}
