import { AppKind, AppKindProfile, GeneratedArtifact } from "../types.js";

export const WORKFLOW_PATH = ".github/workflows/deploy.yml";
export const WORKFLOW_FILE_NAME = "deploy.yml";
export const PLATFORM_SECRET_NAME = "HEROKU_API_KEY";

const appKindProfiles: Record<AppKind, AppKindProfile> = {
  streamlit: {
    kind: "streamlit",
    label: "Streamlit",
    fenceTag: "python",
    entryFile: "app.py",
    toolkitPackage: "streamlit",
    runtimePackages: [],
    runCommand: 'streamlit run app.py --server.port="${PORT}" --server.address=0.0.0.0',
    promptConstraints: [
      "Write a single-file Streamlit app saved as app.py.",
      'Call st.set_page_config(page_title=..., layout="wide") exactly once, as the first Streamlit call.',
      "Read secrets from environment variables with os.getenv; never hard-code keys.",
      "Keep state in st.session_state rather than module globals."
    ]
  },
  gradio: {
    kind: "gradio",
    label: "Gradio",
    fenceTag: "python",
    entryFile: "app.py",
    toolkitPackage: "gradio",
    runtimePackages: [],
    runCommand: "python app.py",
    promptConstraints: [
      "Write a single-file Gradio app saved as app.py.",
      "Build the interface with gr.Blocks() assigned to a variable named demo.",
      'End with demo.launch(server_name="0.0.0.0", server_port=int(os.environ.get("PORT", "7860"))).',
      "Read secrets from environment variables with os.getenv; never hard-code keys."
    ]
  },
  flask: {
    kind: "flask",
    label: "Flask",
    fenceTag: "python",
    entryFile: "app.py",
    toolkitPackage: "flask",
    runtimePackages: ["gunicorn"],
    runCommand: 'gunicorn app:app --bind 0.0.0.0:"${PORT}"',
    promptConstraints: [
      "Write a single-file Flask app saved as app.py.",
      "Expose the Flask instance as a module-level variable named app.",
      "Render HTML with render_template_string so no template directory is needed.",
      "Read secrets from environment variables with os.getenv; never hard-code keys."
    ]
  }
};

export const appKinds: readonly AppKind[] = ["streamlit", "gradio", "flask"];

export function getAppKindProfile(kind: AppKind): AppKindProfile {
  return appKindProfiles[kind];
}

function renderProcfile(profile: AppKindProfile): string {
  return `web: sh setup.sh && ${profile.runCommand}\n`;
}

function renderSetupScript(profile: AppKindProfile): string {
  if (profile.kind !== "streamlit") {
    return `#!/bin/sh
# Nothing to prepare for ${profile.label}; kept so the Procfile stays uniform.
exit 0
`;
  }

  return `#!/bin/sh
mkdir -p ~/.streamlit/
cat > ~/.streamlit/config.toml <<CONFIG
[server]
headless = true
port = \${PORT}
enableCORS = false
CONFIG
`;
}

function renderDockerfile(profile: AppKindProfile): string {
  return `# ${profile.label} app container
FROM python:3.11-slim

WORKDIR /app

COPY requirements.txt .
RUN pip install --no-cache-dir -r requirements.txt

COPY . .

EXPOSE 8000
RUN chmod +x entrypoint.sh setup.sh

ENTRYPOINT ["./entrypoint.sh"]
`;
}

function renderEntrypoint(profile: AppKindProfile): string {
  const portExport =
    profile.kind === "streamlit"
      ? 'export STREAMLIT_SERVER_PORT="${PORT}"\n'
      : profile.kind === "gradio"
        ? 'export GRADIO_SERVER_PORT="${PORT}"\n'
        : "";

  return `#!/bin/sh
set -e
export PORT="\${PORT:-8000}"
${portExport}sh setup.sh
exec ${profile.runCommand}
`;
}

function renderHerokuManifest(): string {
  return `build:
  docker:
    web: Dockerfile

run:
  web: ./entrypoint.sh
`;
}

/**
 * Files committed to a fresh repository, in commit order. The application
 * source and manifest come from generation; everything else is fixed per kind.
 */
export function renderArtifactFiles(kind: AppKind, artifact: GeneratedArtifact): Array<{ path: string; content: string }> {
  const profile = getAppKindProfile(kind);

  return [
    { path: profile.entryFile, content: artifact.code },
    { path: "requirements.txt", content: artifact.requirements },
    { path: "Procfile", content: renderProcfile(profile) },
    { path: "setup.sh", content: renderSetupScript(profile) },
    { path: "Dockerfile", content: renderDockerfile(profile) },
    { path: "entrypoint.sh", content: renderEntrypoint(profile) },
    { path: "heroku.yml", content: renderHerokuManifest() }
  ];
}

export function renderDeployWorkflow(appName: string, branch: string): string {
  const image = `registry.heroku.com/${appName}/web`;

  return `name: Deploy to Heroku

on:
  workflow_dispatch:
  push:
    branches:
      - ${branch}
    paths-ignore:
      - ".github/workflows/**"

jobs:
  build-and-deploy:
    runs-on: ubuntu-latest

    steps:
      - name: Checkout code
        uses: actions/checkout@v4

      - name: Login to Heroku Container Registry
        run: echo "\${{ secrets.${PLATFORM_SECRET_NAME} }}" | docker login --username=_ --password-stdin registry.heroku.com

      - name: Build Docker image
        run: docker build -t ${image} .

      - name: Push Docker image to Heroku
        run: docker push ${image}

      - name: Release app
        run: heroku container:release web --app ${appName}
        env:
          HEROKU_API_KEY: \${{ secrets.${PLATFORM_SECRET_NAME} }}
`;
}
