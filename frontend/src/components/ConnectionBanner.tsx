import './ConnectionBanner.css';

interface ConnectionBannerProps {
  isConnected: boolean;
}

export const ConnectionBanner = ({ isConnected }: ConnectionBannerProps) => {
  if (isConnected) return null;

  return (
    <div className="connection-banner" role="status">
      <span className="connection-banner__spinner" aria-hidden="true" />
      <span>Reconnecting to live feeds…</span>
    </div>
  );
};
