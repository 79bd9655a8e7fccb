// @vitest-environment jsdom
import { afterEach, describe, expect, it } from 'vitest';
import { cleanup, render, screen } from '@testing-library/react';
import { ConnectionBanner } from './ConnectionBanner';

afterEach(cleanup);

describe('ConnectionBanner', () => {
  it('renders nothing while connected', () => {
    const { container } = render(<ConnectionBanner isConnected />);
    expect(container.innerHTML).toBe('');
  });

  it('announces reconnection while disconnected', () => {
    render(<ConnectionBanner isConnected={false} />);
    expect(screen.getByRole('status').textContent).toBe('Reconnecting to live feeds…');
  });
});
