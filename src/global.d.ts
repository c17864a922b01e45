// Stylesheets are bundled by esbuild and inlined into the generated page
declare module '*.css';
