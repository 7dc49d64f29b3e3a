import type { ConfNode } from '../src/cst';
import { blockStatement, rawFragment, simpleStatement } from '../src/cst';

/** A small but complete named.conf, built node by node. */
export function sampleNodes(): ConfNode[] {
  return [
    rawFragment('// managed by named-model tests\n'),
    simpleStatement('include "/etc/named/keys.conf"'),
    blockStatement('acl "internal"', [
      simpleStatement('10.0.0.0/8'),
      simpleStatement('!192.0.2.66'),
      simpleStatement('localhost'),
    ]),
    blockStatement('key "rndc-key"', [
      simpleStatement('algorithm hmac-sha256'),
      simpleStatement('secret "test-secret"'),
    ]),
    blockStatement('key-store "hsm"', [simpleStatement('pkcs11-uri "pkcs11:token=test"')]),
    blockStatement('remote-servers "upstream" port 5353', [
      simpleStatement('192.0.2.1 key "xfer"'),
      simpleStatement('192.0.2.2'),
    ]),
    blockStatement('tls "local-tls"', [
      simpleStatement('cert-file "/etc/named/tls.crt"'),
      simpleStatement('protocols { TLSv1.3; }'),
      simpleStatement('session-tickets no'),
    ]),
    blockStatement('http "doh"', [
      simpleStatement('endpoints { "/dns-query"; }'),
      simpleStatement('listener-clients 100'),
    ]),
    blockStatement('controls', [
      simpleStatement('inet 127.0.0.1 allow { allow; } keys { "rndc-key"; }'),
      simpleStatement('unix "/run/named/rndc.sock" perm 0600 owner 0 group 0'),
    ]),
    blockStatement('logging', [
      blockStatement('channel "main"', [
        simpleStatement('file "/var/log/named.log" versions 3 size 5m'),
        simpleStatement('severity info'),
        simpleStatement('print-time iso8601'),
        simpleStatement('print-category yes'),
      ]),
      simpleStatement('category default { "main"; "default_syslog"; }'),
    ]),
    blockStatement('options', [
      simpleStatement('directory "/var/named"'),
      simpleStatement('recursion no'),
      simpleStatement('allow-query { internal; }'),
      simpleStatement('listen-on port 53 { any; }'),
      simpleStatement('forwarders { 192.0.2.53; }'),
      simpleStatement('forward only'),
      simpleStatement('dnssec-validation auto'),
      simpleStatement('pid-file "/run/named/named.pid"'),
    ]),
    simpleStatement('statistics-channels { inet 127.0.0.1 port 8080; }'),
    blockStatement('trust-anchors', [
      simpleStatement('"." initial-ds 12345 8 2 "ABCD"'),
      simpleStatement('"bad." nothing 1'),
    ]),
    blockStatement('view "internal" IN', [
      simpleStatement('match-clients { internal; }'),
      simpleStatement('recursion yes'),
      blockStatement('zone "example.com"', [
        simpleStatement('type primary'),
        simpleStatement('file "db.example.com"'),
      ]),
    ]),
    blockStatement('zone "example.net" IN', [
      simpleStatement('type secondary'),
      simpleStatement('primaries { 192.0.2.1 key "xfer"; }'),
      simpleStatement('masterfile-format text'),
    ]),
  ];
}
