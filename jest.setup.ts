const ensureTestEnvironment = (): void => {
  // NODE_ENV deve ser "test" durante o Jest
  process.env.NODE_ENV = "test";

  if (!process.env.ENVIRONMENT) {
    process.env.ENVIRONMENT = "test";
  }

  // Buckets e banco reais nunca são usados nos testes; as suítes injetam fakes em memória
  delete process.env.UPLOADS_BUCKET_NAME;
  delete process.env.USER_DOCUMENTS_BUCKET;
  delete process.env.DB_HOST;
};

ensureTestEnvironment();
