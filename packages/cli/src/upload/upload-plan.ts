/** Which bucket an item lands in. */
export type UploadTarget = "data" | "composer";

export type UploadItem =
  | { kind: "folder"; label: string; target: UploadTarget; destination: string }
  | {
      kind: "file";
      label: string;
      target: UploadTarget;
      /** Path relative to the source directory */
      source: string;
      destination: string;
      required: boolean;
    }
  | {
      kind: "glob";
      label: string;
      target: UploadTarget;
      /** Glob relative to the source directory */
      pattern: string;
      /** Destination prefix; matched file names are appended */
      destinationPrefix: string;
      required: boolean;
    };

const FOLDERS = ["sales_data", "reference_data", "jars", "pyspark-jobs", "docs"];

/** Assets of the sales ETL pipeline, in upload order. */
export const ETL_UPLOAD_PLAN: readonly UploadItem[] = [
  ...FOLDERS.map(
    (folder): UploadItem => ({
      kind: "folder",
      label: `${folder}/`,
      target: "data",
      destination: `${folder}/.keep`,
    })
  ),
  {
    kind: "file",
    label: "sales data",
    target: "data",
    source: "sample_data/sales_data/sales_data.csv",
    destination: "sales_data/sales_data.csv",
    required: true,
  },
  {
    kind: "file",
    label: "products",
    target: "data",
    source: "sample_data/reference_data/products.csv",
    destination: "reference_data/products.csv",
    required: true,
  },
  {
    kind: "file",
    label: "stores",
    target: "data",
    source: "sample_data/reference_data/stores.csv",
    destination: "reference_data/stores.csv",
    required: true,
  },
  {
    kind: "glob",
    label: "JDBC jars",
    target: "data",
    pattern: "jars/*.jar",
    destinationPrefix: "jars/",
    required: true,
  },
  {
    kind: "file",
    label: "PySpark job",
    target: "data",
    source: "pyspark-jobs/sales_analytics_direct.py",
    destination: "pyspark-jobs/sales_analytics_direct.py",
    required: true,
  },
  {
    kind: "file",
    label: "database utilities",
    target: "data",
    source: "pyspark-jobs/database_utils.py",
    destination: "pyspark-jobs/database_utils.py",
    required: false,
  },
  {
    kind: "file",
    label: "Airflow DAG",
    target: "composer",
    source: "dags/sales_etl_dag.py",
    destination: "sales_etl_dag.py",
    required: true,
  },
  ...["README.md", "SECRET_MANAGEMENT.md", "DEPLOYMENT_GUIDE.md"].map(
    (doc): UploadItem => ({
      kind: "file",
      label: doc,
      target: "data",
      source: doc,
      destination: `docs/${doc}`,
      required: false,
    })
  ),
];

/** Prefixes listed after upload to confirm what landed. */
export const VERIFY_PREFIXES: readonly { target: UploadTarget; prefix: string }[] = [
  { target: "data", prefix: "sales_data/" },
  { target: "data", prefix: "reference_data/" },
  { target: "data", prefix: "jars/" },
  { target: "data", prefix: "pyspark-jobs/" },
  { target: "composer", prefix: "" },
];
