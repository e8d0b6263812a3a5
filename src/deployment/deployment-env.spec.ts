import { buildDeploymentEnv, renderDotenv } from './deployment-env';

describe('buildDeploymentEnv', () => {
  const deployment = {
    id: 'dep-1',
    repo_full_name: 'octo/shop',
    commit_sha: 'abc123',
    branch: 'main',
  };

  it('layers ambient, deployment identity, then config variables', () => {
    const env = buildDeploymentEnv(
      { PATH: '/usr/bin', BRANCH: 'ambient', HOME: '/home/deploy' },
      deployment,
      { BRANCH: 'from-config', API_URL: 'https://api.test' },
    );

    expect(env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/deploy',
      DEPLOYMENT_ID: 'dep-1',
      REPO_NAME: 'octo/shop',
      COMMIT_SHA: 'abc123',
      BRANCH: 'from-config',
      API_URL: 'https://api.test',
    });
  });

  it('does not modify the ambient environment', () => {
    const ambient = { PATH: '/usr/bin' };

    buildDeploymentEnv(ambient, deployment, { EXTRA: '1' });

    expect(ambient).toEqual({ PATH: '/usr/bin' });
  });
});

describe('renderDotenv', () => {
  it('writes one KEY=value line per variable', () => {
    expect(renderDotenv({ A: '1', B: 'two words' })).toBe('A=1\nB=two words\n');
  });

  it('renders nothing for an empty map', () => {
    expect(renderDotenv({})).toBe('');
  });
});
