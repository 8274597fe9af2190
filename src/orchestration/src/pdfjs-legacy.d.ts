// The CommonJS legacy build exposes the same API as the package entry
declare module 'pdfjs-dist/legacy/build/pdf' {
  export * from 'pdfjs-dist';
}
