import { useStore } from 'zustand';
import { toHex, type Color } from '../core/Color';
import type { FrameStore } from '../visualizer/frameStore';

interface StripViewProps {
  frame: readonly Color[];
  statusLabel?: string;
  ledSize?: number;
}

export function StripView({ frame, statusLabel = '', ledSize = 12 }: StripViewProps): JSX.Element {
  return (
    <div className="strip-panel">
      <div
        className="strip-leds"
        style={{
          display: 'flex',
          gap: 2,
          padding: 4,
          background: '#000',
          border: '2px solid #333',
          borderRadius: 8,
        }}
      >
        {frame.map((color, index) => {
          const hex = toHex(color);
          return (
            <span
              key={index}
              className="led"
              data-color={hex}
              style={{ width: ledSize, height: ledSize, borderRadius: '50%', background: hex }}
            />
          );
        })}
      </div>
      {statusLabel && <div className="strip-status">{statusLabel}</div>}
    </div>
  );
}

interface StripPanelProps {
  store: FrameStore;
  ledSize?: number;
}

/** Live view of a simulated strip */
export default function StripPanel({ store, ledSize }: StripPanelProps): JSX.Element {
  const frame = useStore(store, (s) => s.frame);
  const statusLabel = useStore(store, (s) => s.statusLabel);
  return <StripView frame={frame} statusLabel={statusLabel} ledSize={ledSize} />;
}
