import { deviceIdFromLabel, generateDeviceKeyPair } from "@custody/dsm";

// Prints the registration payload for a new DSM device. The private key goes to the
// device only; the rest is what an operator posts to the registry.
const [label, verifierAddress] = process.argv.slice(2);

if (!label) {
  console.error("usage: npm run device:keygen -- <device-label> [verifier-address]");
  process.exit(1);
}

const run = () => {
  const deviceId = deviceIdFromLabel(label);
  const keys = generateDeviceKeyPair();
  console.log(
    JSON.stringify(
      {
        deviceId,
        publicKey: keys.publicKeyHex,
        privateKey: keys.privateKeyHex,
        registration: {
          method: "POST",
          path: `/v1/admin/verifiers/${encodeURIComponent(verifierAddress ?? "<verifier-address>")}/devices`,
          body: { deviceId, publicKey: keys.publicKeyHex }
        }
      },
      null,
      2
    )
  );
};

try {
  run();
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
